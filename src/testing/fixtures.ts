/**
 * Builders for catalog values and configuration used across test files
 */

import type { Catalog, InventoryItem, Vendor, VendorItemOffer, VendorQuote } from '../types';
import { DEFAULT_CONFIG, type ProcurementConfig } from '../utils/config';

export const ALLOWED_NUMBER = '+15550100001';

export function makeItem(overrides: Partial<InventoryItem> = {}): InventoryItem {
  return {
    id: 'ITM001',
    name: 'USB Cable',
    category: 'Electronics',
    unit: 'pieces',
    currentStock: 10,
    minThreshold: 20,
    reorderQuantity: 100,
    unitCost: 15,
    preferredVendorId: 'V001',
    criticality: 'Medium',
    leadTimeDays: 7,
    ...overrides,
  };
}

export function makeVendor(overrides: Partial<Vendor> = {}): Vendor {
  return {
    id: 'V001',
    name: 'Metro Electronics',
    contactPerson: 'Asha Rao',
    phone: ALLOWED_NUMBER,
    email: 'orders@metro.example',
    rating: 4,
    deliveryTimeDays: 5,
    paymentTerms: '30 days',
    minimumOrderValue: 0,
    status: 'Active',
    ...overrides,
  };
}

export function makeOffer(overrides: Partial<VendorItemOffer> = {}): VendorItemOffer {
  return {
    vendorId: 'V001',
    itemId: 'ITM001',
    vendorItemName: 'USB Cable',
    unitPrice: 50,
    minimumOrderQty: 0,
    bulkDiscount: null,
    leadTimeDays: 5,
    availability: 'In Stock',
    ...overrides,
  };
}

export function makeCatalog(overrides: Partial<Catalog> = {}): Catalog {
  return {
    inventory: [makeItem()],
    vendors: [makeVendor()],
    offers: [makeOffer()],
    ...overrides,
  };
}

/** Defaults with the test number allowed, no pause and fallback on. */
export function makeConfig(
  overrides: { collection?: Partial<ProcurementConfig['collection']> } & Partial<
    Omit<ProcurementConfig, 'collection'>
  > = {},
): ProcurementConfig {
  const { collection, ...rest } = overrides;
  return {
    ...DEFAULT_CONFIG,
    allowedPhoneNumber: ALLOWED_NUMBER,
    ...rest,
    collection: { ...DEFAULT_CONFIG.collection, pauseSeconds: 0, ...collection },
  };
}

export function makeQuote(overrides: Partial<VendorQuote> = {}): VendorQuote {
  return {
    vendorId: 'V001',
    vendorName: 'Metro Electronics',
    lines: [{ itemId: 'ITM001', itemName: 'USB Cable', quantity: 100, unitPrice: 50, lineTotal: 5000 }],
    itemIds: ['ITM001'],
    totalCost: 5000,
    callId: null,
    quotedAt: '2026-10-19T09:00:00.000Z',
    provenance: 'voice-collected',
    score: 0.5,
    ...overrides,
  };
}
