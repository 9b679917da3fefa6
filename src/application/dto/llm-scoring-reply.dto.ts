import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsDefined,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';

// Models emit numeric ids now and then; they are still ids.
const idToString = ({ value }: { value: unknown }): unknown =>
  typeof value === 'number' ? String(value) : value;

export class LlmBulletReplyDto {
  @IsString()
  content!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  score!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  matched_keywords?: string[];

  @IsOptional()
  @IsString()
  explanation?: string;
}

export class LlmEntryReplyDto {
  @Transform(idToString)
  @IsString()
  entry_id!: string;

  @IsString()
  entry_type!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  score!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  matched_keywords?: string[];

  @IsOptional()
  @IsString()
  explanation?: string;

  @IsDefined()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LlmBulletReplyDto)
  bullets!: LlmBulletReplyDto[];
}

export class LlmSectionReplyDto {
  @IsString()
  section_id!: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  score!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  confidence!: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  matched_keywords?: string[];

  @IsOptional()
  @IsString()
  explanation?: string;

  @IsDefined()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LlmEntryReplyDto)
  entries!: LlmEntryReplyDto[];
}

export class LlmScoringReplyDto {
  @IsDefined()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LlmSectionReplyDto)
  sections!: LlmSectionReplyDto[];
}

export type LlmReplyParseResult =
  | { ok: true; reply: LlmScoringReplyDto }
  | { ok: false; error: string };

function describeErrors(errors: readonly ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
    return [...own, ...describeErrors(error.children ?? [], path)];
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a raw LLM reply. Any missing required key, at any depth,
 * rejects the whole reply.
 */
export function parseLlmScoringReply(raw: unknown): LlmReplyParseResult {
  if (!isRecord(raw)) {
    return { ok: false, error: 'Invalid LLM reply: expected a JSON object' };
  }

  const reply = plainToInstance(LlmScoringReplyDto, raw);
  const errors = validateSync(reply);
  if (errors.length > 0) {
    return { ok: false, error: `Invalid LLM reply: ${describeErrors(errors).join('; ')}` };
  }
  return { ok: true, reply };
}
