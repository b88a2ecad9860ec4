import path from 'path';
import type { LoggerService } from '../../shared/types';
import { errorMessage } from '../../shared/types';
import { ConfigurationError } from '../cleaning.errors';
import { isListFile, readListFile } from '../reference/list-file';
import {
  decodeUnicodeEscapes,
  DEFAULT_TERMINAL_MARKS,
  htmlToText,
  keepTerminatedLines,
} from './preprocess';
import {
  isRuleName,
  RULE_REGISTRY,
  RuleDefinition,
  TextTransform,
  trimLines,
} from './rule-operations';

export type RuleArgument = null | number | string | readonly string[];

/** One `(operation, argument)` entry of a chain; order is significant. */
export type RuleSpec = readonly [name: string, args?: RuleArgument];

export type UnknownRulePolicy = 'skip' | 'fail';

export interface RuleEngineOptions {
  logger: LoggerService;
  unknownRulePolicy?: UnknownRulePolicy;
  /** Base directory for relative list-file arguments. */
  listFileDir?: string;
  cleanHtml?: boolean;
  /** Line endings accepted by the punctuation filter. */
  terminalMarks?: readonly string[];
}

export interface RuleRunOptions {
  cleanHtml?: boolean;
  filterPunctuation?: boolean;
  decodeEscapes?: boolean;
}

interface CompiledStep {
  name: string;
  run: TextTransform;
}

export const BASIC_RULES: readonly RuleSpec[] = [
  ['handle_whitespace'],
  ['remove_redundant_lines'],
  ['remove_blank_lines'],
];

function isStringList(value: unknown): value is readonly string[] {
  return (
    Array.isArray(value) && value.every((entry) => typeof entry === 'string')
  );
}

function countGroups(pattern: RegExp): number {
  const probe = new RegExp(`${pattern.source}|`).exec('');
  return probe ? probe.length - 1 : 0;
}

export class RuleEngine {
  private readonly steps: readonly CompiledStep[];
  private readonly terminalMarks: readonly string[];

  constructor(
    config: readonly RuleSpec[],
    private readonly options: RuleEngineOptions,
  ) {
    this.terminalMarks = options.terminalMarks?.length
      ? options.terminalMarks
      : DEFAULT_TERMINAL_MARKS;
    this.steps = config.map(([name, args]) => this.compile(name, args));
  }

  static basic(logger: LoggerService): RuleEngine {
    return new RuleEngine(BASIC_RULES, { logger });
  }

  get stepNames(): string[] {
    return this.steps.map((step) => step.name);
  }

  apply(text: string, run: RuleRunOptions = {}): string {
    if (!text) return '';

    const stages: TextTransform[] = [];
    if (run.decodeEscapes) stages.push(decodeUnicodeEscapes);
    if (run.cleanHtml ?? this.options.cleanHtml) stages.push(htmlToText);
    stages.push(trimLines);
    if (run.filterPunctuation) {
      stages.push((t) => keepTerminatedLines(t, this.terminalMarks));
    }

    let out = text;
    for (const stage of [...stages, ...this.steps.map((s) => s.run)]) {
      out = stage(out);
      if (!out) return out;
    }
    return out;
  }

  private compile(name: string, raw: RuleArgument | undefined): CompiledStep {
    if (!isRuleName(name)) {
      if (this.options.unknownRulePolicy === 'fail') {
        throw new ConfigurationError(`unknown cleaning rule "${name}"`);
      }
      this.options.logger.warn(`Cleaning rule "${name}" is not known, skipping it`);
      return { name, run: (text) => text };
    }

    const args = this.resolveArgument(raw);
    return { name, run: this.build(name, RULE_REGISTRY[name], args) };
  }

  private resolveArgument(
    args: RuleArgument | undefined,
  ): RuleArgument | undefined {
    if (typeof args !== 'string' || !isListFile(args)) return args;

    const dir = this.options.listFileDir ?? process.cwd();
    return readListFile(path.resolve(dir, args));
  }

  private build(
    name: string,
    definition: RuleDefinition,
    args: RuleArgument | undefined,
  ): TextTransform {
    switch (definition.args) {
      case 'none':
        if (args !== undefined && args !== null) {
          throw new ConfigurationError(`rule "${name}" takes no argument`);
        }
        return definition.build();

      case 'literals':
        return definition.build(this.expectLiterals(name, args));

      case 'patterns': {
        const patterns = this.expectLiterals(name, args).map((source) =>
          this.compilePattern(name, source, definition.flags),
        );
        for (const pattern of patterns) {
          if (countGroups(pattern) < definition.minGroups) {
            throw new ConfigurationError(
              `rule "${name}" needs a capture group in /${pattern.source}/`,
            );
          }
        }
        return definition.build(patterns);
      }

      case 'pair': {
        if (!isStringList(args) || args.length !== 2) {
          throw new ConfigurationError(
            `rule "${name}" takes a [pattern, replacement] pair`,
          );
        }
        const [source, replacement] = args;
        return definition.build(
          this.compilePattern(name, source, definition.flags),
          replacement,
        );
      }

      case 'count':
        if (
          typeof args !== 'number' ||
          !Number.isInteger(args) ||
          args < definition.min
        ) {
          throw new ConfigurationError(
            `rule "${name}" takes an integer >= ${definition.min}`,
          );
        }
        return definition.build(args);
    }
  }

  private expectLiterals(
    name: string,
    args: RuleArgument | undefined,
  ): readonly string[] {
    if (!isStringList(args)) {
      throw new ConfigurationError(`rule "${name}" takes a list of strings`);
    }
    if (args.some((entry) => entry.length === 0)) {
      throw new ConfigurationError(`rule "${name}" got an empty entry`);
    }
    return args;
  }

  private compilePattern(name: string, source: string, flags: string): RegExp {
    try {
      return new RegExp(source, flags);
    } catch (e) {
      throw new ConfigurationError(
        `rule "${name}" has an invalid pattern /${source}/: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }
}
