import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateBy,
  ValidateNested,
} from 'class-validator';
import { JobPosting, ResumeContent } from '@domain/types/resume-content.types';

function isWeightMap(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (weight) => typeof weight === 'number' && Number.isFinite(weight) && weight >= 0,
  );
}

export class JobPostingDto implements JobPosting {
  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  company?: string;

  @IsOptional()
  @IsString()
  summary?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  requirements?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  responsibilities?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  technicalSkills?: string[];

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  nonTechnicalSkills?: string[];
}

export class SelectionOptionsDto {
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  minSectionScore?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  minEntryScore?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  maxEntriesPerSection?: number;
}

export class ScoreResumeDto {
  @IsObject()
  resumeContent!: ResumeContent;

  /** Plain reference text; takes precedence over `job`. */
  @IsOptional()
  @IsString()
  jobDescription?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => JobPostingDto)
  job?: JobPostingDto;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  sections?: string[];

  @IsOptional()
  @ValidateBy({
    name: 'isWeightMap',
    validator: {
      validate: isWeightMap,
      defaultMessage: () => '$property must map component names to non-negative numbers',
    },
  })
  weights?: Record<string, number>;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxCharsPerSection?: number;

  @IsOptional()
  @IsBoolean()
  select?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => SelectionOptionsDto)
  selectionOptions?: SelectionOptionsDto;
}
