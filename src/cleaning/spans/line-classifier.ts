export enum LineKind {
  Table = 'table',
  MathProtected = 'math-protected',
  Normal = 'normal',
}

const TABLE_SEPARATOR = /^[\s|\-:]+$/;

export function isTableLine(line: string): boolean {
  const stripped = line.trim();

  const isSeparator =
    TABLE_SEPARATOR.test(stripped) &&
    stripped.includes('|') &&
    stripped.includes('-');
  const isRow = stripped.startsWith('|') && stripped.endsWith('|');

  return isSeparator || isRow;
}

/**
 * Routes one line. Tables win over protected spans so a formula inside a
 * table cell never sends the row through the math path.
 */
export function classifyLine(
  line: string,
  hasPlaceholder: (line: string) => boolean,
): LineKind {
  if (isTableLine(line)) return LineKind.Table;
  if (hasPlaceholder(line)) return LineKind.MathProtected;
  return LineKind.Normal;
}
