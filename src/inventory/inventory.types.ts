/**
 * A value read from an optional column. `absent` means the column is not in
 * the file; `present` with a null value means the cell was left blank.
 */
export type Field<T> = { kind: 'absent' } | { kind: 'present'; value: T };

export const ABSENT: { kind: 'absent' } = { kind: 'absent' };

export function present<T>(value: T): Field<T> {
  return { kind: 'present', value };
}

export interface DecodedTable {
  rows: string[][];
  encoding: string;
}

export interface RowError {
  row: number;
  column: string;
  message: string;
}

export interface NormalizedRow {
  rowNumber: number;
  sku: string;
  name: string;
  sellingPrice: number;
  barcode: Field<string | null>;
  description: Field<string | null>;
  categoryName: Field<string | null>;
  locationName: Field<string | null>;
  supplierName: Field<string | null>;
  stock: Field<number | null>;
  minStock: Field<number | null>;
  costPrice: Field<number | null>;
  unit: Field<string>;
}

interface ResolvedFields
  extends Omit<NormalizedRow, 'categoryName' | 'locationName' | 'supplierName'> {
  categoryId: Field<string | null>;
  supplierId: Field<string | null>;
}

/** A row for a SKU the store does not hold yet; it always has a location. */
export interface ResolvedCreateRow extends ResolvedFields {
  existingId: null;
  locationId: string;
}

/** A row for a stored SKU; an omitted Location column keeps the stored one. */
export interface ResolvedUpdateRow extends ResolvedFields {
  existingId: string;
  locationId: Field<string>;
}

export type ResolvedRow = ResolvedCreateRow | ResolvedUpdateRow;

export interface NamedEntity {
  id: string;
  name: string;
}

export interface ReferenceSnapshot {
  locations: NamedEntity[];
  categories: NamedEntity[];
  suppliers: NamedEntity[];
}

/** SKU → record id, taken once at the start of a submission. */
export type ExistingKeySnapshot = ReadonlyMap<string, string>;

export interface InventoryRecord {
  id: string;
  sku: string;
  barcode: string | null;
  name: string;
  description: string | null;
  categoryId: string | null;
  locationId: string;
  supplierId: string | null;
  currentStock: number;
  minStockLevel: number | null;
  costPrice: number | null;
  sellingPrice: number;
  unit: string;
  isActive: boolean;
}

export type NewInventoryRecord = Omit<InventoryRecord, 'id'>;

export type InventoryRecordPatch = Partial<Omit<InventoryRecord, 'id' | 'sku' | 'isActive'>>;

export type InventoryMutation =
  | { kind: 'create'; rowNumber: number; sku: string; record: NewInventoryRecord }
  | {
      kind: 'update';
      rowNumber: number;
      sku: string;
      id: string;
      changes: InventoryRecordPatch;
    };

export interface BatchApplyResult {
  created: number;
  updated: number;
}

export interface RecordFilter {
  locationId?: string;
  categoryId?: string;
}

export type ImportFailureKind = 'decode' | 'schema' | 'row_limit' | 'commit';

export interface ImportReport {
  success: boolean;
  imported_count: number;
  updated_count: number;
  total_processed: number;
  errors: RowError[];
  encoding_used: string;
  message: string;
  failure?: ImportFailureKind;
}

export type ExportFormat = 'csv' | 'xlsx';

export interface ExportFile {
  filename: string;
  contentType: string;
  body: Buffer;
}
