import fs from 'fs';
import path from 'path';
import { plainToInstance } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsString,
  validateSync,
} from 'class-validator';
import { ReferenceDataError } from '../cleaning.errors';
import { errorMessage } from '../../shared/types';

export class PunctuationFile {
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  punctuations!: string[];
}

export class StopMarkerFile {
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  stops!: string[];
}

export class NumeralTableFile {
  @IsArray()
  @ArrayMinSize(10)
  @ArrayMaxSize(10)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  numbers!: string[]; // glyphs for 0..9
}

export interface ReferenceData {
  punctuations: readonly string[];
  stops: readonly string[];
  numerals: readonly string[];
}

export const REFERENCE_FILES = {
  punctuations: 'devanagari_punctuations.json',
  stops: 'sundry_stops.json',
  numerals: 'devanagari_numbers.json',
} as const;

function readJson<T extends object>(
  schema: new () => T,
  filePath: string,
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ReferenceDataError(
      `cannot read reference file ${filePath}: ${errorMessage(e)}`,
      filePath,
      { cause: e },
    );
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ReferenceDataError(`${filePath} must hold a JSON object`, filePath);
  }

  const instance = plainToInstance(schema, raw);
  const errors = validateSync(instance);
  if (errors.length) {
    const details = errors
      .flatMap((err) => Object.values(err.constraints ?? {}))
      .join('; ');
    throw new ReferenceDataError(`${filePath} is invalid: ${details}`, filePath);
  }
  return instance;
}

/** Loads and validates the three mandatory lookup files from `dir`. */
export function loadReferenceData(dir: string): ReferenceData {
  const punctuation = readJson(
    PunctuationFile,
    path.join(dir, REFERENCE_FILES.punctuations),
  );
  const stops = readJson(StopMarkerFile, path.join(dir, REFERENCE_FILES.stops));
  const numerals = readJson(
    NumeralTableFile,
    path.join(dir, REFERENCE_FILES.numerals),
  );

  return Object.freeze({
    punctuations: Object.freeze([...punctuation.punctuations]),
    stops: Object.freeze([...stops.stops]),
    numerals: Object.freeze([...numerals.numbers]),
  });
}

/** Line endings the punctuation filter accepts. */
export function terminalMarks(data: ReferenceData): string[] {
  return [...new Set([...data.punctuations, ...data.stops])];
}
