import { randomUUID } from 'node:crypto';
import {
  BatchApplyResult,
  ExistingKeySnapshot,
  InventoryMutation,
  InventoryRecord,
  NamedEntity,
  RecordFilter,
  ReferenceSnapshot,
} from '../inventory/inventory.types';
import { InventoryRepository } from './inventory.repository';

export interface InMemoryInventorySeed {
  locations?: NamedEntity[];
  categories?: NamedEntity[];
  suppliers?: NamedEntity[];
  records?: InventoryRecord[];
}

/**
 * Process-local store. Batches are applied to a copy of the current state
 * which replaces it only when every mutation succeeds.
 */
export class InMemoryInventoryRepository extends InventoryRepository {
  private readonly references: ReferenceSnapshot;
  private records: Map<string, InventoryRecord>;

  constructor(seed: InMemoryInventorySeed = {}) {
    super();
    this.references = {
      locations: [...(seed.locations ?? [])],
      categories: [...(seed.categories ?? [])],
      suppliers: [...(seed.suppliers ?? [])],
    };
    this.records = new Map(
      (seed.records ?? []).map((record) => [record.id, { ...record }] as const),
    );
  }

  async getReferenceSnapshot(): Promise<ReferenceSnapshot> {
    return {
      locations: [...this.references.locations],
      categories: [...this.references.categories],
      suppliers: [...this.references.suppliers],
    };
  }

  async getExistingKeys(): Promise<ExistingKeySnapshot> {
    const keys = new Map<string, string>();
    this.records.forEach((record) => keys.set(record.sku, record.id));
    return keys;
  }

  async applyBatch(mutations: InventoryMutation[]): Promise<BatchApplyResult> {
    const staged = new Map(
      [...this.records].map(([id, record]) => [id, { ...record }] as const),
    );
    const result: BatchApplyResult = { created: 0, updated: 0 };

    for (const mutation of mutations) {
      if (mutation.kind === 'create') {
        this.assertSkuFree(staged, mutation.sku);
        const id = randomUUID();
        staged.set(id, { ...mutation.record, id });
        result.created += 1;
      } else {
        const current = staged.get(mutation.id);
        if (!current) {
          throw new Error(`Inventory item ${mutation.id} (SKU '${mutation.sku}') no longer exists`);
        }

        staged.set(mutation.id, { ...current, ...mutation.changes });
        result.updated += 1;
      }
    }

    this.assertBarcodesUnique(staged);
    this.records = staged;
    return result;
  }

  async listRecords(filter: RecordFilter): Promise<InventoryRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.isActive)
      .filter((record) => !filter.locationId || record.locationId === filter.locationId)
      .filter((record) => !filter.categoryId || record.categoryId === filter.categoryId)
      .map((record) => ({ ...record }));
  }

  findBySku(sku: string): InventoryRecord | undefined {
    const record = [...this.records.values()].find((candidate) => candidate.sku === sku);
    return record ? { ...record } : undefined;
  }

  get size(): number {
    return this.records.size;
  }

  private assertSkuFree(records: Map<string, InventoryRecord>, sku: string): void {
    for (const record of records.values()) {
      if (record.sku === sku) {
        throw new Error(`SKU '${sku}' already exists`);
      }
    }
  }

  private assertBarcodesUnique(records: Map<string, InventoryRecord>): void {
    const owners = new Map<string, string>();
    for (const record of records.values()) {
      if (record.barcode == null) {
        continue;
      }

      const owner = owners.get(record.barcode);
      if (owner !== undefined) {
        throw new Error(
          `Barcode '${record.barcode}' is used by both SKU '${owner}' and SKU '${record.sku}'`,
        );
      }

      owners.set(record.barcode, record.sku);
    }
  }
}
