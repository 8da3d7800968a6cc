import { Injectable, Logger } from '@nestjs/common';
import { CallerIdentity } from '../auth/caller';
import { SpreadsheetExportService } from '../services/spreadsheet-export.service';
import { InventoryRepository } from '../store/inventory.repository';
import { ExportFile, ExportFormat, RecordFilter } from './inventory.types';

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export interface ExportOptions {
  format?: ExportFormat;
  locationId?: string;
  categoryId?: string;
}

@Injectable()
export class InventoryExportService {
  private readonly logger = new Logger(InventoryExportService.name);

  constructor(
    private readonly repository: InventoryRepository,
    private readonly spreadsheet: SpreadsheetExportService,
  ) {}

  async exportInventory(
    caller: CallerIdentity,
    options: ExportOptions = {},
    now: Date = new Date(),
  ): Promise<ExportFile> {
    const format = options.format ?? 'csv';
    // Callers bound to a location see that location unless they ask for another.
    const filter: RecordFilter = {
      locationId: options.locationId ?? caller.defaultLocationId ?? undefined,
      categoryId: options.categoryId,
    };

    const [records, references] = await Promise.all([
      this.repository.listRecords(filter),
      this.repository.getReferenceSnapshot(),
    ]);

    const rows = this.spreadsheet.buildRows(records, references);
    this.logger.log(`Exported ${records.length} items for ${caller.userId} as ${format}`);

    return {
      filename: `inventory_export_${now.toISOString().slice(0, 10)}.${format}`,
      contentType: CONTENT_TYPES[format],
      body: this.spreadsheet.write(rows, format),
    };
  }

  buildTemplate(): ExportFile {
    return {
      filename: 'inventory_template.csv',
      contentType: CONTENT_TYPES.csv,
      body: this.spreadsheet.write(this.spreadsheet.templateRows(), 'csv'),
    };
  }
}
