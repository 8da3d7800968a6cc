import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ExportFormat } from '../inventory.types';

export class ExportQueryDto {
  @IsOptional()
  @IsIn(['csv', 'xlsx'])
  format?: ExportFormat;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  locationId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  categoryId?: string;
}
