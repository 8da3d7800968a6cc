import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import {
  ExportFormat,
  InventoryRecord,
  NamedEntity,
  ReferenceSnapshot,
} from '../inventory/inventory.types';
import { CANONICAL_COLUMNS } from './column-schema.service';

const TEMPLATE_EXAMPLE_ROW = [
  'SAMPLE-001',
  '1234567890123',
  'Sample Product',
  'Example description',
  'General',
  'Main Store',
  '',
  '100',
  '10',
  '500',
  '1000',
  'pcs',
];

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest decimal text that parses back to the same number, in positional
 * form with no thousands separators.
 */
export function formatDecimal(value: number | null): string {
  if (value == null) {
    return '';
  }

  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const point = 1 + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return sign + digits + '0'.repeat(point - digits.length);
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

@Injectable()
export class SpreadsheetExportService {
  /** Header plus one row per record, in canonical column order. */
  buildRows(records: InventoryRecord[], references: ReferenceSnapshot): string[][] {
    const locations = this.buildIdMap(references.locations);
    const categories = this.buildIdMap(references.categories);
    const suppliers = this.buildIdMap(references.suppliers);
    const nameOf = (names: Map<string, string>, id: string | null): string =>
      id == null ? '' : names.get(id) ?? '';

    const body = [...records]
      .sort((a, b) => (a.sku < b.sku ? -1 : a.sku > b.sku ? 1 : 0))
      .map((record) => [
        record.sku,
        record.barcode ?? '',
        record.name,
        record.description ?? '',
        nameOf(categories, record.categoryId),
        nameOf(locations, record.locationId),
        nameOf(suppliers, record.supplierId),
        formatDecimal(record.currentStock),
        formatDecimal(record.minStockLevel),
        formatDecimal(record.costPrice),
        formatDecimal(record.sellingPrice),
        record.unit,
      ]);

    return [[...CANONICAL_COLUMNS], ...body];
  }

  templateRows(): string[][] {
    return [[...CANONICAL_COLUMNS], [...TEMPLATE_EXAMPLE_ROW]];
  }

  write(rows: string[][], format: ExportFormat): Buffer {
    const sheet = XLSX.utils.aoa_to_sheet(rows);

    if (format === 'csv') {
      return Buffer.from(XLSX.utils.sheet_to_csv(sheet), 'utf-8');
    }

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Inventory');
    const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(output)) {
      throw new Error('Spreadsheet writer did not return a buffer');
    }

    return output;
  }

  private buildIdMap(entities: NamedEntity[]): Map<string, string> {
    return new Map(entities.map((entity): [string, string] => [entity.id, entity.name]));
  }
}
