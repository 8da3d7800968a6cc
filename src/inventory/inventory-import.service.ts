import { Injectable, Logger } from '@nestjs/common';
import { CallerIdentity } from '../auth/caller';
import { ImportFailure, RowLimitExceeded } from '../common/import-errors';
import { APP_CONFIG } from '../config/app.config';
import { ColumnSchemaService } from '../services/column-schema.service';
import { DecoderService } from '../services/decoder.service';
import { ReconciliationService } from '../services/reconciliation.service';
import { ReferenceResolverService } from '../services/reference-resolver.service';
import { RowNormalizerService } from '../services/row-normalizer.service';
import { TransactionCommitterService } from '../services/transaction-committer.service';
import { InventoryRepository } from '../store/inventory.repository';
import { ImportReport, ResolvedRow, RowError } from './inventory.types';

@Injectable()
export class InventoryImportService {
  private readonly logger = new Logger(InventoryImportService.name);
  private readonly maxRows = APP_CONFIG.import.maxRows;

  constructor(
    private readonly decoder: DecoderService,
    private readonly columnSchema: ColumnSchemaService,
    private readonly normalizer: RowNormalizerService,
    private readonly resolver: ReferenceResolverService,
    private readonly reconciliation: ReconciliationService,
    private readonly committer: TransactionCommitterService,
    private readonly repository: InventoryRepository,
  ) {}

  /**
   * Validates every row, then commits the accepted ones in a single batch.
   * Row problems are collected in the report; decode, schema, row-limit and
   * commit failures end the import with nothing saved.
   */
  async importFile(buffer: Buffer, caller: CallerIdentity): Promise<ImportReport> {
    let encoding = '';
    const errors: RowError[] = [];

    try {
      const table = this.decoder.decode(buffer);
      encoding = table.encoding;

      const [header, ...dataRows] = table.rows;
      const columns = this.columnSchema.resolveColumns(header);
      if (dataRows.length > this.maxRows) {
        throw new RowLimitExceeded(dataRows.length, this.maxRows);
      }

      // Read once so every row sees the same store state.
      const [references, existingKeys] = await Promise.all([
        this.repository.getReferenceSnapshot(),
        this.repository.getExistingKeys(),
      ]);
      const lookup = this.resolver.buildLookup(
        references,
        existingKeys,
        caller.defaultLocationId,
      );

      const accepted: ResolvedRow[] = [];
      dataRows.forEach((cells, index) => {
        const normalized = this.normalizer.normalize(cells, columns, index + 1);
        if (normalized.kind === 'blank') {
          return;
        }
        if (normalized.kind === 'error') {
          errors.push(normalized.error);
          return;
        }

        const resolved = this.resolver.resolve(normalized.row, lookup);
        if (resolved.kind === 'error') {
          errors.push(resolved.error);
          return;
        }

        accepted.push(resolved.row);
      });

      const mutations = this.reconciliation.reconcile(accepted);
      const { created, updated } = await this.committer.commit(mutations);

      this.logger.log(
        `Import by ${caller.userId} complete (${encoding}). Created=${created}, Updated=${updated}, Errors=${errors.length}`,
      );

      return {
        success: true,
        imported_count: created,
        updated_count: updated,
        total_processed: created + updated,
        errors,
        encoding_used: encoding,
        message: this.summarize(created, updated, errors.length),
      };
    } catch (error: unknown) {
      if (!(error instanceof ImportFailure)) {
        throw error;
      }

      this.logger.warn(`Import by ${caller.userId} failed: ${error.message}`);
      return {
        success: false,
        imported_count: 0,
        updated_count: 0,
        total_processed: 0,
        errors,
        encoding_used: encoding,
        message: error.message,
        failure: error.kind,
      };
    }
  }

  private summarize(created: number, updated: number, errorCount: number): string {
    const base = `Imported ${created} new items, updated ${updated} items`;
    return errorCount ? `${base} with ${errorCount} errors` : base;
  }
}
