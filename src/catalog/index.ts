/**
 * Catalog queries: reorder checks, pricing and vendor eligibility
 */

import type {
  Catalog,
  InventoryItem,
  StockStatus,
  Vendor,
  VendorItemOffer,
} from '../types';

export { loadCatalog, parseCatalog, CatalogError } from './loader';
export type { CatalogPaths, CatalogLoadResult, CatalogRowError } from './loader';

export function needsReorder(item: InventoryItem): boolean {
  return item.currentStock <= item.minThreshold;
}

export function stockStatus(item: InventoryItem): StockStatus {
  if (item.currentStock <= item.minThreshold) return 'LOW';
  if (item.currentStock <= item.minThreshold * 1.5) return 'MEDIUM';
  return 'OK';
}

export function itemsNeedingReorder(catalog: Catalog): InventoryItem[] {
  return catalog.inventory.filter(needsReorder);
}

/**
 * Unit price for a quantity, with the bulk tier applied when reached.
 */
export function effectivePrice(offer: VendorItemOffer, quantity: number): number {
  if (offer.bulkDiscount && quantity >= offer.bulkDiscount.quantity) {
    return offer.bulkDiscount.price;
  }
  return offer.unitPrice;
}

/**
 * A vendor may only be called on the single allow-listed number.
 */
export function isAuthorizedVendor(vendor: Vendor, allowedPhoneNumber: string): boolean {
  return allowedPhoneNumber.length > 0 && vendor.phone.trim() === allowedPhoneNumber;
}

export function findVendor(catalog: Catalog, vendorId: string): Vendor | undefined {
  return catalog.vendors.find((v) => v.id === vendorId);
}

/**
 * Offers a vendor makes for the given items, in item order. Items the vendor
 * does not carry are left out.
 */
export function offersForVendor(
  catalog: Catalog,
  vendorId: string,
  items: InventoryItem[],
): Array<{ item: InventoryItem; offer: VendorItemOffer }> {
  const matches: Array<{ item: InventoryItem; offer: VendorItemOffer }> = [];
  for (const item of items) {
    const offer = catalog.offers.find((o) => o.vendorId === vendorId && o.itemId === item.id);
    if (offer) {
      matches.push({ item, offer });
    }
  }
  return matches;
}

export interface CatalogSummary {
  totalVendors: number;
  activeVendors: number;
  authorizedVendors: number;
  totalItems: number;
  itemsNeedingReorder: number;
  totalOffers: number;
}

export function summarizeCatalog(catalog: Catalog, allowedPhoneNumber: string): CatalogSummary {
  return {
    totalVendors: catalog.vendors.length,
    activeVendors: catalog.vendors.filter((v) => v.status === 'Active').length,
    authorizedVendors: catalog.vendors.filter((v) => isAuthorizedVendor(v, allowedPhoneNumber)).length,
    totalItems: catalog.inventory.length,
    itemsNeedingReorder: itemsNeedingReorder(catalog).length,
    totalOffers: catalog.offers.length,
  };
}

/**
 * Quantity to order from an offer: the item's reorder quantity, raised to
 * the vendor's minimum order quantity when that is higher.
 */
export function orderQuantity(item: InventoryItem, offer: VendorItemOffer): number {
  return Math.max(item.reorderQuantity, offer.minimumOrderQty);
}
