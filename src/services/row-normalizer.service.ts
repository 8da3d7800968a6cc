import { Injectable } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config';
import {
  ABSENT,
  Field,
  NormalizedRow,
  RowError,
  present,
} from '../inventory/inventory.types';
import { ColumnIndex, ColumnName } from './column-schema.service';

export type NormalizeOutcome =
  | { kind: 'blank' }
  | { kind: 'row'; row: NormalizedRow }
  | { kind: 'error'; error: RowError };

// Optional sign, digit groups joined by thousands commas, optional decimal part.
const NUMBER_PATTERN = /^-?(?:\d+(?:,\d+)*(?:\.\d*)?|\.\d+)$/;

/**
 * Parses a number written with a point as decimal separator and commas as
 * thousands separators. Returns null for anything else.
 */
export function parseDecimal(raw: string): number | null {
  const text = raw.trim();
  if (!NUMBER_PATTERN.test(text)) {
    return null;
  }

  const parsed = Number(text.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

class RowRejected extends Error {
  constructor(
    readonly column: ColumnName,
    message: string,
  ) {
    super(message);
  }
}

@Injectable()
export class RowNormalizerService {
  private readonly defaultUnit = APP_CONFIG.import.defaultUnit;

  /** `rowNumber` is 1-based and excludes the header row. */
  normalize(cells: string[], columns: ColumnIndex, rowNumber: number): NormalizeOutcome {
    if (cells.every((cell) => cell.trim() === '')) {
      return { kind: 'blank' };
    }

    try {
      return { kind: 'row', row: this.buildRow(cells, columns, rowNumber) };
    } catch (error: unknown) {
      if (error instanceof RowRejected) {
        return {
          kind: 'error',
          error: { row: rowNumber, column: error.column, message: error.message },
        };
      }

      throw error;
    }
  }

  private buildRow(cells: string[], columns: ColumnIndex, rowNumber: number): NormalizedRow {
    const sku = this.requireText(cells, columns, 'SKU');
    const name = this.requireText(cells, columns, 'Name');
    const sellingPrice = this.requirePrice(cells, columns);

    const unit = this.getText(cells, columns, 'Unit');

    return {
      rowNumber,
      sku,
      name,
      sellingPrice,
      barcode: this.getText(cells, columns, 'Barcode'),
      description: this.getText(cells, columns, 'Description'),
      categoryName: this.getText(cells, columns, 'Category'),
      locationName: this.getText(cells, columns, 'Location'),
      supplierName: this.getText(cells, columns, 'Supplier'),
      stock: this.getNumber(cells, columns, 'Stock', true),
      minStock: this.getNumber(cells, columns, 'Min Stock', true),
      costPrice: this.getNumber(cells, columns, 'Cost Price', false),
      unit: unit.kind === 'absent' ? ABSENT : present(unit.value ?? this.defaultUnit),
    };
  }

  private getCell(cells: string[], columns: ColumnIndex, column: ColumnName): string | undefined {
    const position = columns.get(column);
    if (position === undefined) {
      return undefined;
    }

    // Short rows are padded with empty cells.
    return (cells[position] ?? '').trim();
  }

  private getText(
    cells: string[],
    columns: ColumnIndex,
    column: ColumnName,
  ): Field<string | null> {
    const value = this.getCell(cells, columns, column);
    if (value === undefined) {
      return ABSENT;
    }

    return present(value === '' ? null : value);
  }

  private getNumber(
    cells: string[],
    columns: ColumnIndex,
    column: ColumnName,
    allowNegative: boolean,
  ): Field<number | null> {
    const value = this.getCell(cells, columns, column);
    if (value === undefined) {
      return ABSENT;
    }

    if (value === '') {
      return present(null);
    }

    const parsed = parseDecimal(value);
    if (parsed == null || (!allowNegative && parsed < 0)) {
      throw new RowRejected(column, `Invalid ${column} '${value}'`);
    }

    return present(parsed);
  }

  private requireText(cells: string[], columns: ColumnIndex, column: ColumnName): string {
    const value = this.getCell(cells, columns, column);
    if (!value) {
      throw new RowRejected(column, `Missing or empty ${column}`);
    }

    return value;
  }

  private requirePrice(cells: string[], columns: ColumnIndex): number {
    const value = this.requireText(cells, columns, 'Selling Price');
    const parsed = parseDecimal(value);
    if (parsed == null || parsed <= 0) {
      throw new RowRejected('Selling Price', `Invalid Selling Price '${value}'`);
    }

    return parsed;
  }
}
