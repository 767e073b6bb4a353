// grade.dto.ts
import { ApiProperty } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsPositive, IsString, Max, Min } from 'class-validator';

export class CreateGradeDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @IsPositive()
  studentId!: number;

  @ApiProperty({ example: 'Math' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  subject!: string;

  @ApiProperty({ example: 88, minimum: 0, maximum: 100 })
  @IsInt()
  @Min(0)
  @Max(100)
  grade!: number;
}

export class GradeQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  studentId?: number;

  @IsOptional()
  @IsString()
  subject?: string;
}
