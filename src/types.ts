/**
 * Shared domain types for the procurement agent
 */

// =============================================================================
// CATALOG
// =============================================================================

export type Criticality = 'High' | 'Medium' | 'Low';
export type StockStatus = 'LOW' | 'MEDIUM' | 'OK';
export type VendorStatus = 'Active' | 'Inactive';

export interface InventoryItem {
  id: string;
  name: string;
  category: string;
  unit: string;
  currentStock: number;
  minThreshold: number;
  reorderQuantity: number;
  unitCost: number;
  preferredVendorId: string;
  criticality: Criticality;
  leadTimeDays: number;
}

export interface Vendor {
  id: string;
  name: string;
  contactPerson: string;
  phone: string;
  email: string;
  /** 0-5 */
  rating: number;
  deliveryTimeDays: number;
  /** Free text: "30 days", "Net 45", "COD" */
  paymentTerms: string;
  minimumOrderValue: number;
  status: VendorStatus;
}

export interface BulkDiscount {
  quantity: number;
  price: number;
}

export interface VendorItemOffer {
  vendorId: string;
  itemId: string;
  vendorItemName: string;
  unitPrice: number;
  minimumOrderQty: number;
  bulkDiscount: BulkDiscount | null;
  leadTimeDays: number;
  availability: string;
}

/** Everything a cycle reads, loaded wholesale before it starts. */
export interface Catalog {
  inventory: InventoryItem[];
  vendors: Vendor[];
  offers: VendorItemOffer[];
}

// =============================================================================
// QUOTES
// =============================================================================

export type QuoteProvenance = 'voice-collected' | 'fallback-estimated';

export interface QuoteLine {
  itemId: string;
  itemName: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface VendorQuote {
  vendorId: string;
  vendorName: string;
  lines: readonly QuoteLine[];
  itemIds: readonly string[];
  totalCost: number;
  callId: string | null;
  quotedAt: string;
  provenance: QuoteProvenance;
  score: number;
}

// =============================================================================
// LEDGER
// =============================================================================

export const RECORD_STATUSES = [
  'Completed',
  'CallFailed',
  'EmailFailed',
  'NoVendorFound',
  'QuotesOnly',
] as const;

export type RecordStatus = (typeof RECORD_STATUSES)[number];

export type CycleOutcome = RecordStatus | 'NoActionNeeded';

export interface ProcurementRecord {
  id: string;
  timestamp: string;
  itemsRequired: readonly string[];
  itemIds: readonly string[];
  selectedVendorId: string | null;
  selectedVendorName: string | null;
  totalCost: number;
  totalItems: number;
  savings: number;
  quotesReceived: number;
  status: RecordStatus;
  callId: string | null;
  emailSent: boolean;
  approvalRequired: boolean;
  orderNumber: string | null;
  notes: string;
}
