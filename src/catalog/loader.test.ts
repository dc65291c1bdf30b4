import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { CatalogError, loadCatalog, parseCatalog } from './loader';

const INVENTORY = [
  'item_id,item_name,current_stock,min_threshold,reorder_quantity,unit_cost,criticality',
  'ITM001,USB Cable,10,20,100,"₹1,200.50",high',
  'ITM002,Mouse,5,10,,30,',
].join('\n');

const VENDORS = [
  'vendor_id,vendor_name,phone_number,rating,delivery_time_days,payment_terms,status',
  'V001,Metro,+15550100001,4.5,5,30 days,Active',
  'V002,Legacy,+15550100002,3,10,COD,inactive',
].join('\n');

const OFFERS = [
  'vendor_id,item_id,unit_price,minimum_order_qty,bulk_discount_qty,bulk_discount_price',
  'V001,ITM001,14.00,50,200,12.50',
  'V001,ITM002,29,,,',
].join('\n');

describe('parseCatalog', () => {
  const { catalog, errors } = parseCatalog({ inventory: INVENTORY, vendors: VENDORS, offers: OFFERS });

  it('parses inventory rows with defaults', () => {
    expect(catalog.inventory).toEqual([
      {
        id: 'ITM001',
        name: 'USB Cable',
        category: '',
        unit: 'units',
        currentStock: 10,
        minThreshold: 20,
        reorderQuantity: 100,
        unitCost: 1200.5,
        preferredVendorId: '',
        criticality: 'High',
        leadTimeDays: 7,
      },
    ]);
  });

  it('reports rows that fail validation', () => {
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ file: 'inventory', row: 2, column: 'reorderQuantity' });
  });

  it('reads vendor status case-insensitively', () => {
    expect(catalog.vendors.map((v) => [v.id, v.status])).toEqual([
      ['V001', 'Active'],
      ['V002', 'Inactive'],
    ]);
    expect(catalog.vendors[0].rating).toBe(4.5);
    expect(catalog.vendors[1].paymentTerms).toBe('COD');
  });

  it('builds the bulk tier only when both columns are present', () => {
    expect(catalog.offers[0].bulkDiscount).toEqual({ quantity: 200, price: 12.5 });
    expect(catalog.offers[0].minimumOrderQty).toBe(50);
    expect(catalog.offers[1].bulkDiscount).toBeNull();
    expect(catalog.offers[1].minimumOrderQty).toBe(0);
    expect(catalog.offers[1].availability).toBe('In Stock');
  });
});

describe('loadCatalog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'catalog-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads the three files', async () => {
    writeFileSync(join(dir, 'inventory.csv'), INVENTORY);
    writeFileSync(join(dir, 'vendors.csv'), VENDORS);
    writeFileSync(join(dir, 'offers.csv'), OFFERS);

    const { catalog, errors } = await loadCatalog({
      inventoryCsv: join(dir, 'inventory.csv'),
      vendorsCsv: join(dir, 'vendors.csv'),
      offersCsv: join(dir, 'offers.csv'),
    });

    expect(catalog.inventory).toHaveLength(1);
    expect(catalog.vendors).toHaveLength(2);
    expect(catalog.offers).toHaveLength(2);
    expect(errors[0].file).toBe(join(dir, 'inventory.csv'));
  });

  it('throws CatalogError for a missing file', async () => {
    writeFileSync(join(dir, 'inventory.csv'), INVENTORY);
    writeFileSync(join(dir, 'offers.csv'), OFFERS);

    const missing = join(dir, 'vendors.csv');
    const attempt = loadCatalog({
      inventoryCsv: join(dir, 'inventory.csv'),
      vendorsCsv: missing,
      offersCsv: join(dir, 'offers.csv'),
    });

    await expect(attempt).rejects.toBeInstanceOf(CatalogError);
    await expect(attempt).rejects.toThrow(`Cannot read catalog file ${missing}: file not found`);
  });

  it('loads the bundled sample data without errors', async () => {
    const dataDir = resolve(__dirname, '../../data');
    const { catalog, errors } = await loadCatalog({
      inventoryCsv: join(dataDir, 'inventory.csv'),
      vendorsCsv: join(dataDir, 'vendors.csv'),
      offersCsv: join(dataDir, 'vendor_items.csv'),
    });

    expect(errors).toEqual([]);
    expect(catalog.inventory).toHaveLength(5);
    expect(catalog.vendors).toHaveLength(4);
    expect(catalog.offers).toHaveLength(8);
  });
});
