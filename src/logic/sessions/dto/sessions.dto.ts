import { Type } from 'class-transformer';
import { IsArray, IsIn, IsInt, IsOptional, IsString, Min, ValidateNested } from 'class-validator';
import { ROLES, Role } from '../types';

export class CreateSessionDto {
  @IsOptional()
  @IsString()
  title?: string;
}

export class SourceCitationDto {
  @IsString()
  source!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  page: number | null = null;

  @IsString()
  excerpt!: string;
}

export class RecordMessageDto {
  @IsIn([...ROLES])
  role!: Role;

  @IsString()
  content!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SourceCitationDto)
  sources?: SourceCitationDto[];
}

export class HistoryQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  limit?: number;
}
