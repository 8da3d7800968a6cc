import {
  BadGatewayException,
  BadRequestException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  PayloadTooLargeException,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { CallerIdentity } from '../auth/caller';
import { CallerGuard, CurrentCaller, RequirePermission } from '../auth/caller.guard';
import { APP_CONFIG } from '../config/app.config';
import { ExportQueryDto } from './dto/export-query.dto';
import { InventoryExportService } from './inventory-export.service';
import { InventoryImportService } from './inventory-import.service';
import { ExportFile, ImportReport } from './inventory.types';

@Controller('inventory')
@UseGuards(CallerGuard)
export class InventoryController {
  constructor(
    private readonly importService: InventoryImportService,
    private readonly exportService: InventoryExportService,
  ) {}

  @Post('import')
  @HttpCode(HttpStatus.OK)
  @RequirePermission('manage_inventory')
  @UseInterceptors(
    FileInterceptor('file', {
      storage: memoryStorage(),
      limits: {
        fileSize: APP_CONFIG.import.maxFileBytes,
      },
      fileFilter: (_req, file, callback) => {
        const allowed = file.originalname.toLowerCase().endsWith('.csv');

        callback(
          allowed ? null : new BadRequestException('Only .csv files are supported'),
          allowed,
        );
      },
    }),
  )
  async importInventory(
    @CurrentCaller() caller: CallerIdentity,
    @UploadedFile() file?: Express.Multer.File,
  ): Promise<ImportReport> {
    if (!file?.buffer) {
      throw new BadRequestException('No input file uploaded');
    }

    const report = await this.importService.importFile(file.buffer, caller);

    // The report is the error body, so row errors stay visible.
    switch (report.failure) {
      case 'decode':
      case 'schema':
        throw new BadRequestException(report);
      case 'row_limit':
        throw new PayloadTooLargeException(report);
      case 'commit':
        throw new BadGatewayException(report);
      default:
        return report;
    }
  }

  @Get('export')
  @RequirePermission('view_reports')
  async exportInventory(
    @CurrentCaller() caller: CallerIdentity,
    @Query() query: ExportQueryDto,
  ): Promise<StreamableFile> {
    const file = await this.exportService.exportInventory(caller, query);
    return this.toStreamable(file);
  }

  @Get('import-template')
  getImportTemplate(): StreamableFile {
    return this.toStreamable(this.exportService.buildTemplate());
  }

  private toStreamable(file: ExportFile): StreamableFile {
    return new StreamableFile(file.body, {
      type: file.contentType,
      disposition: `attachment; filename="${file.filename}"`,
      length: file.body.length,
    });
  }
}
