import { Injectable, Logger } from '@nestjs/common';
import { StoreCommitFailure, getErrorMessage } from '../common/import-errors';
import { BatchApplyResult, InventoryMutation } from '../inventory/inventory.types';
import { InventoryRepository } from '../store/inventory.repository';

@Injectable()
export class TransactionCommitterService {
  private readonly logger = new Logger(TransactionCommitterService.name);

  constructor(private readonly repository: InventoryRepository) {}

  /**
   * Applies the whole mutation list as one unit. Any store error discards
   * the batch and surfaces as a StoreCommitFailure.
   */
  async commit(mutations: InventoryMutation[]): Promise<BatchApplyResult> {
    if (!mutations.length) {
      return { created: 0, updated: 0 };
    }

    try {
      const result = await this.repository.applyBatch(mutations);
      this.logger.log(`Committed ${result.created} creates and ${result.updated} updates`);
      return result;
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      this.logger.error(`Batch of ${mutations.length} mutations rejected by store: ${message}`);
      throw new StoreCommitFailure(message);
    }
  }
}
