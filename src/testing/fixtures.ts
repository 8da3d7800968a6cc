import { CallerIdentity } from '../auth/caller';
import {
  ABSENT,
  InventoryRecord,
  ReferenceSnapshot,
  ResolvedCreateRow,
  ResolvedUpdateRow,
} from '../inventory/inventory.types';
import { InMemoryInventoryRepository } from '../store/in-memory-inventory.repository';

export const REFERENCES: ReferenceSnapshot = {
  locations: [
    { id: 'loc-main', name: 'Main Store' },
    { id: 'loc-annex', name: 'Annex' },
  ],
  categories: [{ id: 'cat-gen', name: 'General' }],
  suppliers: [{ id: 'sup-acme', name: 'Acme Supply' }],
};

export function existingRecord(overrides: Partial<InventoryRecord> = {}): InventoryRecord {
  return {
    id: 'item-1',
    sku: 'EX-1',
    barcode: '111',
    name: 'Existing',
    description: 'Old desc',
    categoryId: 'cat-gen',
    locationId: 'loc-main',
    supplierId: 'sup-acme',
    currentStock: 5,
    minStockLevel: 2,
    costPrice: 3,
    sellingPrice: 10,
    unit: 'box',
    isActive: true,
    ...overrides,
  };
}

export function seededRepository(records: InventoryRecord[] = [existingRecord()]) {
  return new InMemoryInventoryRepository({ ...REFERENCES, records });
}

export function caller(overrides: Partial<CallerIdentity> = {}): CallerIdentity {
  return { userId: 'user-1', role: 'manager', defaultLocationId: 'loc-main', ...overrides };
}

const UNSUBMITTED = {
  barcode: ABSENT,
  description: ABSENT,
  categoryId: ABSENT,
  supplierId: ABSENT,
  stock: ABSENT,
  minStock: ABSENT,
  costPrice: ABSENT,
  unit: ABSENT,
};

export function createRow(overrides: Partial<ResolvedCreateRow> = {}): ResolvedCreateRow {
  return {
    rowNumber: 1,
    sku: 'SKU-1',
    name: 'Item',
    sellingPrice: 10,
    ...UNSUBMITTED,
    existingId: null,
    locationId: 'loc-main',
    ...overrides,
  };
}

export function updateRow(overrides: Partial<ResolvedUpdateRow> = {}): ResolvedUpdateRow {
  return {
    rowNumber: 1,
    sku: 'EX-1',
    name: 'Item',
    sellingPrice: 10,
    ...UNSUBMITTED,
    existingId: 'item-1',
    locationId: ABSENT,
    ...overrides,
  };
}

/** Joins CSV lines into UTF-8 file bytes. */
export function csv(...lines: string[]): Buffer {
  return Buffer.from(`${lines.join('\n')}\n`, 'utf-8');
}

export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error: unknown) {
    return error;
  }

  throw new Error('Expected the action to throw');
}
