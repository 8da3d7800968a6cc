import { Module } from '@nestjs/common';
import { ColumnSchemaService } from '../services/column-schema.service';
import { DecoderService } from '../services/decoder.service';
import { ReconciliationService } from '../services/reconciliation.service';
import { ReferenceResolverService } from '../services/reference-resolver.service';
import { RowNormalizerService } from '../services/row-normalizer.service';
import { SpreadsheetExportService } from '../services/spreadsheet-export.service';
import { TransactionCommitterService } from '../services/transaction-committer.service';
import { inventoryRepositoryProvider } from '../store/inventory-repository.provider';
import { InventoryController } from './inventory.controller';
import { InventoryExportService } from './inventory-export.service';
import { InventoryImportService } from './inventory-import.service';

@Module({
  controllers: [InventoryController],
  providers: [
    DecoderService,
    ColumnSchemaService,
    RowNormalizerService,
    ReferenceResolverService,
    ReconciliationService,
    TransactionCommitterService,
    SpreadsheetExportService,
    InventoryImportService,
    InventoryExportService,
    inventoryRepositoryProvider,
  ],
})
export class InventoryModule {}
