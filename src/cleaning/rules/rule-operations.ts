export type TextTransform = (text: string) => string;

export type RuleName =
  | 'remove_line_with_keyword'
  | 'remove_line_with_pattern'
  | 'remove_line_and_before'
  | 'remove_line_and_after'
  | 'remove_line_and_above'
  | 'remove_line_and_below'
  | 'remove_after_keyword'
  | 'remove_single_word_lines'
  | 'remove_blank_lines'
  | 'remove_lines_starting_with'
  | 'remove_redundant_lines'
  | 'remove_lines_with_repeated_seqs'
  | 'remove_patterns'
  | 'insert_on_pattern'
  | 'add_newline_on_pattern'
  | 'select_on_pattern'
  | 'handle_whitespace';

/**
 * Each operation declares the argument shape it takes so the engine can
 * validate and compile a chain before any text goes through it.
 */
export type RuleDefinition =
  | { args: 'none'; build: () => TextTransform }
  | { args: 'literals'; build: (keywords: readonly string[]) => TextTransform }
  | {
      args: 'patterns';
      flags: string;
      minGroups: number;
      build: (patterns: readonly RegExp[]) => TextTransform;
    }
  | {
      args: 'pair';
      flags: string;
      build: (pattern: RegExp, replacement: string) => TextTransform;
    }
  | { args: 'count'; min: number; build: (count: number) => TextTransform };

const splitLines = (text: string): string[] => text.split('\n');
const joinLines = (lines: readonly string[]): string => lines.join('\n');

export const tokenize = (line: string): string[] =>
  line.split(/\s+/).filter(Boolean);

function keepLines(predicate: (line: string) => boolean): TextTransform {
  return (text) => joinLines(splitLines(text).filter(predicate));
}

const containsAny = (line: string, keywords: readonly string[]): boolean =>
  keywords.some((keyword) => line.includes(keyword));

export const trimLines: TextTransform = (text) =>
  joinLines(splitLines(text).map((line) => line.trim()));

function removeWithNeighbour(offset: -1 | 1) {
  return (keywords: readonly string[]): TextTransform =>
    (text) => {
      const lines = splitLines(text);
      const doomed = new Set<number>();

      for (const keyword of keywords) {
        lines.forEach((line, i) => {
          if (!line.includes(keyword)) return;
          doomed.add(i);
          const neighbour = i + offset;
          if (neighbour >= 0 && neighbour < lines.length) doomed.add(neighbour);
        });
      }

      return joinLines(lines.filter((_, i) => !doomed.has(i)));
    };
}

// Keywords are applied one after another; each sees what the previous left.
function removeThrough(direction: 'above' | 'below') {
  return (keywords: readonly string[]): TextTransform =>
    (text) => {
      let lines = splitLines(text);

      for (const keyword of keywords) {
        const hits: number[] = [];
        lines.forEach((line, i) => {
          if (line.includes(keyword)) hits.push(i);
        });
        if (!hits.length) continue;

        lines =
          direction === 'above'
            ? lines.slice(hits[hits.length - 1] + 1)
            : lines.slice(0, hits[0]);
      }

      return joinLines(lines);
    };
}

function truncateAtKeyword(keywords: readonly string[]): TextTransform {
  return (text) =>
    joinLines(
      splitLines(text).map((line) => {
        let cut = -1;
        for (const keyword of keywords) {
          const index = line.indexOf(keyword);
          if (index !== -1 && (cut === -1 || index < cut)) cut = index;
        }
        return cut === -1 ? line : line.slice(0, cut).trim();
      }),
    );
}

function dedupeLines(): TextTransform {
  return (text) => joinLines([...new Set(splitLines(text))]);
}

/**
 * True when some substring of `line` occurs `minRepeat` times back to back.
 * A unit of `size` repeats that often exactly where `line[i] === line[i + size]`
 * holds for `(minRepeat - 1) * size` consecutive positions.
 */
export function hasRepeatedSubstring(line: string, minRepeat: number): boolean {
  const longest = Math.floor(line.length / minRepeat);

  for (let size = 1; size <= longest; size++) {
    const needed = (minRepeat - 1) * size;
    let run = 0;

    for (let i = 0; i + size < line.length; i++) {
      run = line[i] === line[i + size] ? run + 1 : 0;
      if (run >= needed) return true;
    }
  }

  return false;
}

function selectFirstGroup(patterns: readonly RegExp[]): TextTransform {
  return (text) => {
    let selected = text;
    for (const pattern of patterns) {
      const match = pattern.exec(selected);
      if (match) selected = match[1] ?? '';
    }
    return selected;
  };
}

function replaceAllMatches(
  patterns: readonly RegExp[],
  replacement: string,
): TextTransform {
  return (text) =>
    patterns.reduce((acc, pattern) => acc.replace(pattern, replacement), text);
}

export const RULE_REGISTRY: Readonly<Record<RuleName, RuleDefinition>> = {
  remove_line_with_keyword: {
    args: 'literals',
    build: (keywords) => keepLines((line) => !containsAny(line, keywords)),
  },
  remove_line_with_pattern: {
    args: 'patterns',
    flags: '',
    minGroups: 0,
    build: (patterns) =>
      keepLines((line) => !patterns.some((pattern) => pattern.test(line))),
  },
  remove_line_and_before: { args: 'literals', build: removeWithNeighbour(-1) },
  remove_line_and_after: { args: 'literals', build: removeWithNeighbour(1) },
  remove_line_and_above: { args: 'literals', build: removeThrough('above') },
  remove_line_and_below: { args: 'literals', build: removeThrough('below') },
  remove_after_keyword: { args: 'literals', build: truncateAtKeyword },
  remove_single_word_lines: {
    args: 'none',
    build: () => keepLines((line) => tokenize(line).length !== 1),
  },
  remove_blank_lines: {
    args: 'none',
    build: () => keepLines((line) => line.trim().length > 0),
  },
  remove_lines_starting_with: {
    args: 'literals',
    build: (keywords) =>
      keepLines((line) => !keywords.some((keyword) => line.startsWith(keyword))),
  },
  remove_redundant_lines: { args: 'none', build: dedupeLines },
  remove_lines_with_repeated_seqs: {
    args: 'count',
    min: 2,
    build: (count) => keepLines((line) => !hasRepeatedSubstring(line, count)),
  },
  remove_patterns: {
    args: 'patterns',
    flags: 'gs',
    minGroups: 0,
    build: (patterns) => replaceAllMatches(patterns, ''),
  },
  insert_on_pattern: {
    args: 'pair',
    flags: 'gs',
    build: (pattern, replacement) => replaceAllMatches([pattern], replacement),
  },
  add_newline_on_pattern: {
    args: 'patterns',
    flags: 'gs',
    minGroups: 1,
    build: (patterns) => replaceAllMatches(patterns, '$1\n'),
  },
  select_on_pattern: {
    args: 'patterns',
    flags: 'm',
    minGroups: 1,
    build: selectFirstGroup,
  },
  handle_whitespace: { args: 'none', build: () => trimLines },
};

export function isRuleName(name: string): name is RuleName {
  return Object.prototype.hasOwnProperty.call(RULE_REGISTRY, name);
}
