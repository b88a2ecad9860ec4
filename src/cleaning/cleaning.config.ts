import path from 'path';
import { ConfigService } from '@nestjs/config';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsBooleanString,
  IsEnum,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from './cleaning.errors';
import type { UnknownRulePolicy } from './rules/rule-engine';
import { DEFAULT_MIN_TOKENS, DEFAULT_RATIO_THRESHOLD } from './script/script-gate';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

const UNKNOWN_RULE_POLICIES: readonly UnknownRulePolicy[] = ['skip', 'fail'];

export const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', '..', 'data');

export class EnvironmentVariables {
  @IsOptional()
  @IsEnum(Environment)
  NODE_ENV?: Environment;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  JOB_NAME?: string;

  @IsOptional()
  @IsString()
  APP_NAME?: string;

  @IsOptional()
  @IsString()
  LOKI_HOST?: string;

  @IsOptional()
  @IsString()
  CLEANING_DATA_DIR?: string;

  @IsOptional()
  @IsString()
  CLEANING_RULES_FILE?: string;

  @IsOptional()
  @IsString()
  CLEANING_PHRASES_FILE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  CLEANING_SCRIPT_RATIO?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  CLEANING_MIN_TOKENS?: number;

  @IsOptional()
  @IsBooleanString()
  CLEANING_TRANSLITERATE?: string;

  @IsOptional()
  @IsBooleanString()
  CLEANING_ENFORCE_SCRIPT?: string;

  @IsOptional()
  @IsBooleanString()
  CLEANING_MASK_PHRASES?: string;

  @IsOptional()
  @Length(1, 1)
  CLEANING_MASK_CHAR?: string;

  @IsOptional()
  @IsIn(UNKNOWN_RULE_POLICIES)
  CLEANING_UNKNOWN_RULE_POLICY?: UnknownRulePolicy;
}

/** `validate` hook for `ConfigModule.forRoot`. */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated);

  if (errors.length) {
    const details = errors
      .flatMap((err) => Object.values(err.constraints ?? {}))
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  return validated;
}

export interface CleaningConfig {
  dataDir: string;
  stopwordsDir: string;
  rulesFile: string;
  phrasesFile: string;
  ratioThreshold: number;
  minTokens: number;
  transliterate: boolean;
  /** Reject lines whose script ratio is under the threshold. */
  enforceScript: boolean;
  maskPhrases: boolean;
  maskChar: string;
  unknownRulePolicy: UnknownRulePolicy;
}

function isUnknownRulePolicy(value: string): value is UnknownRulePolicy {
  return UNKNOWN_RULE_POLICIES.some((policy) => policy === value);
}

export function loadCleaningConfig(config: ConfigService): CleaningConfig {
  const text = (key: string): string | undefined => {
    const raw = config.get<string | number | boolean>(key);
    return raw === undefined || raw === '' ? undefined : String(raw);
  };

  const num = (key: string, fallback: number): number => {
    const raw = text(key);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
    }
    return value;
  };

  const flag = (key: string, fallback: boolean): boolean => {
    const raw = text(key);
    if (raw === undefined) return fallback;
    return raw === 'true' || raw === '1';
  };

  const policy = text('CLEANING_UNKNOWN_RULE_POLICY') ?? 'skip';
  if (!isUnknownRulePolicy(policy)) {
    throw new ConfigurationError(
      `CLEANING_UNKNOWN_RULE_POLICY must be one of ${UNKNOWN_RULE_POLICIES.join(', ')}, got "${policy}"`,
    );
  }

  const dataDir = path.resolve(text('CLEANING_DATA_DIR') ?? DEFAULT_DATA_DIR);

  return Object.freeze({
    dataDir,
    stopwordsDir: path.join(dataDir, 'stopwords'),
    rulesFile: path.resolve(
      dataDir,
      text('CLEANING_RULES_FILE') ?? path.join('rules', 'news-boilerplate.json'),
    ),
    phrasesFile: path.resolve(
      dataDir,
      text('CLEANING_PHRASES_FILE') ?? path.join('phrases', 'blocked_phrases.txt'),
    ),
    ratioThreshold: num('CLEANING_SCRIPT_RATIO', DEFAULT_RATIO_THRESHOLD),
    minTokens: num('CLEANING_MIN_TOKENS', DEFAULT_MIN_TOKENS),
    transliterate: flag('CLEANING_TRANSLITERATE', true),
    enforceScript: flag('CLEANING_ENFORCE_SCRIPT', true),
    maskPhrases: flag('CLEANING_MASK_PHRASES', true),
    maskChar: text('CLEANING_MASK_CHAR') ?? '*',
    unknownRulePolicy: policy,
  });
}
