import { Type } from 'class-transformer';
import { IsArray, IsIn, IsInt, IsOptional, IsString, Matches, ValidateNested } from 'class-validator';
import { ROLES, Role } from '../../sessions/types';

export class ChatTurnDto {
  @IsIn([...ROLES])
  role!: Role;

  @IsString()
  content!: string;
}

export class AskDto {
  @IsString()
  @Matches(/\S/, { message: 'question must not be blank' })
  question!: string;

  @Type(() => Number)
  @IsInt()
  sessionId!: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ChatTurnDto)
  history?: ChatTurnDto[];
}
