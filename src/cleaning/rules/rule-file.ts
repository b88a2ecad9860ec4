import fs from 'fs';
import { ConfigurationError, ReferenceDataError } from '../cleaning.errors';
import { errorMessage } from '../../shared/types';
import type { RuleArgument, RuleSpec } from './rule-engine';

function isRuleArgument(value: unknown): value is RuleArgument {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    (Array.isArray(value) && value.every((v) => typeof v === 'string'))
  );
}

/**
 * Reads a JSON rule chain: an array of `[name]` or `[name, argument]` pairs.
 */
export function loadRuleFile(filePath: string): RuleSpec[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ReferenceDataError(
      `cannot load rule file ${filePath}: ${errorMessage(e)}`,
      filePath,
      { cause: e },
    );
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigurationError(`rule file ${filePath} must hold an array`);
  }

  return parsed.map((entry: unknown, i): RuleSpec => {
    if (
      !Array.isArray(entry) ||
      entry.length < 1 ||
      entry.length > 2 ||
      typeof entry[0] !== 'string'
    ) {
      throw new ConfigurationError(
        `rule #${i} in ${filePath} must be [name] or [name, argument]`,
      );
    }

    const name: string = entry[0];
    if (entry.length === 1) return [name];

    const args: unknown = entry[1];
    if (!isRuleArgument(args)) {
      throw new ConfigurationError(`rule "${name}" in ${filePath} has a bad argument`);
    }
    return [name, args];
  });
}
