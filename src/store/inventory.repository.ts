import {
  BatchApplyResult,
  ExistingKeySnapshot,
  InventoryMutation,
  InventoryRecord,
  RecordFilter,
  ReferenceSnapshot,
} from '../inventory/inventory.types';

/**
 * Persistent inventory store consumed by the import and export pipelines.
 * Also the Nest injection token for whichever implementation is configured.
 */
export abstract class InventoryRepository {
  /** Locations, categories and suppliers available for name resolution. */
  abstract getReferenceSnapshot(): Promise<ReferenceSnapshot>;

  /** Every stored SKU, active or not, mapped to its record id. */
  abstract getExistingKeys(): Promise<ExistingKeySnapshot>;

  /** Applies every mutation, or none of them when any one fails. */
  abstract applyBatch(mutations: InventoryMutation[]): Promise<BatchApplyResult>;

  /** Active records matching the filter. */
  abstract listRecords(filter: RecordFilter): Promise<InventoryRecord[]>;
}
