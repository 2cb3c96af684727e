import { IsOptional, IsString } from 'class-validator';

/**
 * Query DTO for transaction listings. Both fields are parsed leniently:
 * an unknown type means all types and a bad limit means the default.
 */
export class HistoryQueryDto {
  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsString()
  limit?: string;
}
