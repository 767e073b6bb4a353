import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString } from 'class-validator';

export class StudentQueryDto {
  // Substring match on full name
  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  bornAfter?: number;
}
