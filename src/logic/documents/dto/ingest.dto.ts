import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsOptional, IsString, MinLength, ValidateNested } from 'class-validator';

export class InlineDocumentDto {
  @IsString()
  @MinLength(1)
  filename!: string;

  @IsArray()
  @IsString({ each: true })
  pages!: string[];
}

export class IngestDto {
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  paths?: string[];

  @IsOptional()
  @IsString()
  @MinLength(1)
  folder?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InlineDocumentDto)
  documents?: InlineDocumentDto[];

  @IsOptional()
  @IsString()
  indexDir?: string;
}
