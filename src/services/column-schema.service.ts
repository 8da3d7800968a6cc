import { Injectable } from '@nestjs/common';
import { SchemaFailure } from '../common/import-errors';

export const REQUIRED_COLUMNS = ['SKU', 'Name', 'Selling Price'] as const;

export const OPTIONAL_COLUMNS = [
  'Barcode',
  'Description',
  'Category',
  'Location',
  'Supplier',
  'Stock',
  'Min Stock',
  'Cost Price',
  'Unit',
] as const;

export type ColumnName = (typeof REQUIRED_COLUMNS)[number] | (typeof OPTIONAL_COLUMNS)[number];

/** Export and template column order. */
export const CANONICAL_COLUMNS: readonly ColumnName[] = [
  'SKU',
  'Barcode',
  'Name',
  'Description',
  'Category',
  'Location',
  'Supplier',
  'Stock',
  'Min Stock',
  'Cost Price',
  'Selling Price',
  'Unit',
];

/** Recognized column → cell index in the submitted header. */
export type ColumnIndex = ReadonlyMap<ColumnName, number>;

export function normalizeHeader(header: string): string {
  return header.trim().replace(/\s+/g, ' ').toLowerCase();
}

@Injectable()
export class ColumnSchemaService {
  private readonly byNormalizedName = new Map<string, ColumnName>(
    CANONICAL_COLUMNS.map((column) => [normalizeHeader(column), column]),
  );

  /**
   * Maps the header row onto recognized columns and fails fast when a
   * required column is missing. Unknown headers are ignored; on duplicate
   * headers the first occurrence is used.
   */
  resolveColumns(header: string[] | undefined): ColumnIndex {
    const index = new Map<ColumnName, number>();

    (header ?? []).forEach((cell, position) => {
      const column = this.byNormalizedName.get(normalizeHeader(cell));
      if (column && !index.has(column)) {
        index.set(column, position);
      }
    });

    const missing = REQUIRED_COLUMNS.filter((column) => !index.has(column));
    if (missing.length) {
      throw new SchemaFailure([...missing]);
    }

    return index;
  }
}
