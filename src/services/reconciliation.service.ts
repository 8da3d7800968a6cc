import { Injectable } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config';
import {
  Field,
  InventoryMutation,
  InventoryRecordPatch,
  NewInventoryRecord,
  ResolvedCreateRow,
  ResolvedRow,
  ResolvedUpdateRow,
} from '../inventory/inventory.types';

function valueOr<T, D>(field: Field<T>, fallback: D): T | D {
  return field.kind === 'present' ? field.value : fallback;
}

@Injectable()
export class ReconciliationService {
  private readonly defaultUnit = APP_CONFIG.import.defaultUnit;

  /**
   * One mutation per SKU, creates and updates as the resolver classified them
   * against the existing-key snapshot. When a SKU repeats, the later row
   * replaces the earlier one; the mutation keeps the position of the SKU's
   * first appearance.
   */
  reconcile(rows: ResolvedRow[]): InventoryMutation[] {
    const latestBySku = new Map<string, ResolvedRow>();
    rows.forEach((row) => {
      latestBySku.set(row.sku, row);
    });

    return [...latestBySku.values()].map((row): InventoryMutation => {
      if (row.existingId === null) {
        return {
          kind: 'create',
          rowNumber: row.rowNumber,
          sku: row.sku,
          record: this.buildRecord(row),
        };
      }

      return {
        kind: 'update',
        rowNumber: row.rowNumber,
        sku: row.sku,
        id: row.existingId,
        changes: this.buildPatch(row),
      };
    });
  }

  private buildRecord(row: ResolvedCreateRow): NewInventoryRecord {
    return {
      sku: row.sku,
      barcode: valueOr(row.barcode, null),
      name: row.name,
      description: valueOr(row.description, null),
      categoryId: valueOr(row.categoryId, null),
      locationId: row.locationId,
      supplierId: valueOr(row.supplierId, null),
      currentStock: valueOr(row.stock, null) ?? 0,
      minStockLevel: valueOr(row.minStock, null),
      costPrice: valueOr(row.costPrice, null),
      sellingPrice: row.sellingPrice,
      unit: valueOr(row.unit, this.defaultUnit),
      isActive: true,
    };
  }

  /**
   * Only submitted columns reach the patch. A blank cell in a submitted
   * optional column clears the stored value.
   */
  private buildPatch(row: ResolvedUpdateRow): InventoryRecordPatch {
    const changes: InventoryRecordPatch = {
      name: row.name,
      sellingPrice: row.sellingPrice,
    };

    if (row.barcode.kind === 'present') changes.barcode = row.barcode.value;
    if (row.description.kind === 'present') changes.description = row.description.value;
    if (row.categoryId.kind === 'present') changes.categoryId = row.categoryId.value;
    if (row.locationId.kind === 'present') changes.locationId = row.locationId.value;
    if (row.supplierId.kind === 'present') changes.supplierId = row.supplierId.value;
    if (row.stock.kind === 'present') changes.currentStock = row.stock.value ?? 0;
    if (row.minStock.kind === 'present') changes.minStockLevel = row.minStock.value;
    if (row.costPrice.kind === 'present') changes.costPrice = row.costPrice.value;
    if (row.unit.kind === 'present') changes.unit = row.unit.value;

    return changes;
  }
}
