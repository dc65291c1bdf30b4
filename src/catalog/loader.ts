/**
 * Catalog Loader - reads the inventory, vendor and vendor-item offer CSVs
 *
 * The three files are loaded wholesale into one Catalog value. A missing or
 * unreadable file is fatal (CatalogError); rows that fail validation are
 * skipped and reported so one bad line does not hide the rest of the catalog.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import type {
  Catalog,
  InventoryItem,
  Vendor,
  VendorItemOffer,
} from '../types';
import { parseCsv, type CsvRow } from './csv-parser';

const logger = createLogger('catalog-loader');

// =============================================================================
// ERRORS
// =============================================================================

export class CatalogError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'CatalogError';
    this.path = path;
  }
}

export interface CatalogRowError {
  file: string;
  row: number;
  column: string;
  message: string;
}

export interface CatalogPaths {
  inventoryCsv: string;
  vendorsCsv: string;
  offersCsv: string;
}

export interface CatalogLoadResult {
  catalog: Catalog;
  errors: CatalogRowError[];
}

// =============================================================================
// COLUMN ALIASES
// =============================================================================

const INVENTORY_ALIASES: Record<string, string> = {
  item_id: 'id',
  id: 'id',
  sku: 'id',
  item_name: 'name',
  name: 'name',
  item: 'name',
  product_name: 'name',
  category: 'category',
  unit: 'unit',
  uom: 'unit',
  current_stock: 'currentStock',
  stock: 'currentStock',
  quantity: 'currentStock',
  qty: 'currentStock',
  min_threshold: 'minThreshold',
  minimum_threshold: 'minThreshold',
  reorder_point: 'minThreshold',
  reorder_quantity: 'reorderQuantity',
  reorder_qty: 'reorderQuantity',
  unit_cost: 'unitCost',
  cost: 'unitCost',
  preferred_vendor_id: 'preferredVendorId',
  preferred_vendor: 'preferredVendorId',
  supplier: 'preferredVendorId',
  criticality: 'criticality',
  lead_time_days: 'leadTimeDays',
};

const VENDOR_ALIASES: Record<string, string> = {
  vendor_id: 'id',
  id: 'id',
  vendor_name: 'name',
  name: 'name',
  contact_person: 'contactPerson',
  contact: 'contactPerson',
  phone_number: 'phone',
  phone: 'phone',
  email: 'email',
  rating: 'rating',
  delivery_time_days: 'deliveryTimeDays',
  delivery_time: 'deliveryTimeDays',
  delivery_days: 'deliveryTimeDays',
  payment_terms: 'paymentTerms',
  terms: 'paymentTerms',
  minimum_order_value: 'minimumOrderValue',
  min_order_value: 'minimumOrderValue',
  status: 'status',
};

const OFFER_ALIASES: Record<string, string> = {
  vendor_id: 'vendorId',
  item_id: 'itemId',
  vendor_item_name: 'vendorItemName',
  unit_price: 'unitPrice',
  price: 'unitPrice',
  minimum_order_qty: 'minimumOrderQty',
  moq: 'minimumOrderQty',
  bulk_discount_qty: 'bulkDiscountQty',
  bulk_discount_price: 'bulkDiscountPrice',
  lead_time_days: 'leadTimeDays',
  availability_status: 'availability',
  availability: 'availability',
};

// =============================================================================
// ROW SCHEMAS
// =============================================================================

/** Empty cells become undefined so defaults apply. */
const blank = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);
/** "₹1,200.50" -> "1200.50" */
const money = (value: unknown) => (typeof value === 'string' ? value.replace(/[^0-9.-]/g, '') : value);

const requiredText = z.string().trim().min(1);
const optionalText = (fallback: string) => z.preprocess(blank, z.string().trim().default(fallback));
const count = z.preprocess(blank, z.coerce.number().int().min(0));
const price = z.preprocess((v) => blank(money(v)), z.coerce.number().min(0));

const inventoryRowSchema = z.object({
  id: requiredText,
  name: requiredText,
  category: optionalText(''),
  unit: optionalText('units'),
  currentStock: count,
  minThreshold: count,
  reorderQuantity: z.preprocess(blank, z.coerce.number().int().positive()),
  unitCost: z.preprocess((v) => blank(money(v)), z.coerce.number().min(0).default(0)),
  preferredVendorId: optionalText(''),
  criticality: z.preprocess(
    (v) => (typeof v === 'string' && v.trim() ? v.trim()[0].toUpperCase() + v.trim().slice(1).toLowerCase() : undefined),
    z.enum(['High', 'Medium', 'Low']).default('Medium'),
  ),
  leadTimeDays: z.preprocess(blank, z.coerce.number().int().min(0).default(7)),
});

const vendorRowSchema = z.object({
  id: requiredText,
  name: requiredText,
  contactPerson: optionalText(''),
  phone: optionalText(''),
  email: optionalText(''),
  rating: z.preprocess(blank, z.coerce.number().min(0).max(5)),
  deliveryTimeDays: count,
  paymentTerms: optionalText(''),
  minimumOrderValue: z.preprocess((v) => blank(money(v)), z.coerce.number().min(0).default(0)),
  status: z.preprocess(
    (v) => (typeof v === 'string' && v.trim().toLowerCase() === 'inactive' ? 'Inactive' : 'Active'),
    z.enum(['Active', 'Inactive']),
  ),
});

const offerRowSchema = z
  .object({
    vendorId: requiredText,
    itemId: requiredText,
    vendorItemName: optionalText(''),
    unitPrice: price,
    minimumOrderQty: z.preprocess(blank, z.coerce.number().int().min(0).default(0)),
    bulkDiscountQty: z.preprocess(blank, z.coerce.number().int().positive().optional()),
    bulkDiscountPrice: z.preprocess((v) => blank(money(v)), z.coerce.number().min(0).optional()),
    leadTimeDays: z.preprocess(blank, z.coerce.number().int().min(0).default(7)),
    availability: optionalText('In Stock'),
  })
  .transform(({ bulkDiscountQty, bulkDiscountPrice, ...rest }): VendorItemOffer => ({
    ...rest,
    bulkDiscount:
      bulkDiscountQty !== undefined && bulkDiscountPrice !== undefined
        ? { quantity: bulkDiscountQty, price: bulkDiscountPrice }
        : null,
  }));

// =============================================================================
// LOADING
// =============================================================================

async function readCatalogFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : '';
    const reason = code === 'ENOENT' ? 'file not found' : err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Cannot read catalog file ${path}: ${reason}`, path);
  }
}

function validateRows<S extends z.ZodTypeAny>(
  file: string,
  rows: CsvRow[],
  schema: S,
  errors: CatalogRowError[],
): Array<z.output<S>> {
  const valid: Array<z.output<S>> = [];
  for (const row of rows) {
    const result = schema.safeParse(row.values);
    if (result.success) {
      valid.push(result.data);
      continue;
    }
    for (const issue of result.error.issues) {
      errors.push({
        file,
        row: row.rowNumber,
        column: issue.path.join('.') || '(row)',
        message: issue.message,
      });
    }
  }
  return valid;
}

/**
 * Parse the three catalog tables from already-read CSV text.
 */
export function parseCatalog(
  sources: { inventory: string; vendors: string; offers: string },
  fileNames: CatalogPaths = { inventoryCsv: 'inventory', vendorsCsv: 'vendors', offersCsv: 'offers' },
): CatalogLoadResult {
  const errors: CatalogRowError[] = [];

  const inventory: InventoryItem[] = validateRows(
    fileNames.inventoryCsv,
    parseCsv(sources.inventory, { aliases: INVENTORY_ALIASES }).rows,
    inventoryRowSchema,
    errors,
  );
  const vendors: Vendor[] = validateRows(
    fileNames.vendorsCsv,
    parseCsv(sources.vendors, { aliases: VENDOR_ALIASES }).rows,
    vendorRowSchema,
    errors,
  );
  const offers: VendorItemOffer[] = validateRows(
    fileNames.offersCsv,
    parseCsv(sources.offers, { aliases: OFFER_ALIASES }).rows,
    offerRowSchema,
    errors,
  );

  return { catalog: { inventory, vendors, offers }, errors };
}

/**
 * Read and parse the catalog files. Throws CatalogError when a file is missing.
 */
export async function loadCatalog(paths: CatalogPaths): Promise<CatalogLoadResult> {
  const [inventory, vendors, offers] = await Promise.all([
    readCatalogFile(paths.inventoryCsv),
    readCatalogFile(paths.vendorsCsv),
    readCatalogFile(paths.offersCsv),
  ]);

  const result = parseCatalog({ inventory, vendors, offers }, paths);

  for (const error of result.errors) {
    logger.warn(error, 'Skipped invalid catalog row');
  }
  logger.info(
    {
      items: result.catalog.inventory.length,
      vendors: result.catalog.vendors.length,
      offers: result.catalog.offers.length,
      rejectedRows: new Set(result.errors.map((e) => `${e.file}:${e.row}`)).size,
    },
    'Catalog loaded',
  );

  return result;
}
