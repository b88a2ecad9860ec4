// Placeholders are wrapped in private-use code points; the tag grows until
// it does not occur anywhere in the input.
const OPEN = '\uE000';
const CLOSE = '\uE001';
const BASE_TAG = 'SPAN';

/** Single-line span forms, scanned in this order. */
export const PROTECTED_SPAN_PATTERNS: readonly RegExp[] = [
  /`[^\n]*?`/g, // inline code
  /\$\$[^\n]*?\$\$/g, // display math
  /\$[^\n$]+\$/g, // inline math
];

/**
 * A document with its spans swapped out. The placeholder mapping belongs to
 * this document only.
 */
export class ProtectedText {
  constructor(
    readonly text: string,
    private readonly marker: string,
    readonly spans: ReadonlyMap<string, string>,
  ) {}

  hasPlaceholder(line: string): boolean {
    return line.includes(this.marker);
  }

  restore(text: string): string {
    let restored = text;
    for (const [placeholder, original] of this.spans) {
      restored = restored.split(placeholder).join(original);
    }
    return restored;
  }
}

export class SpanProtector {
  constructor(
    private readonly patterns: readonly RegExp[] = PROTECTED_SPAN_PATTERNS,
  ) {}

  protect(text: string): ProtectedText {
    const marker = this.pickMarker(text);
    const spans = new Map<string, string>();

    let protectedText = text;
    for (const pattern of this.patterns) {
      protectedText = protectedText.replace(pattern, (match) => {
        const placeholder = `${marker}${spans.size}${CLOSE}`;
        spans.set(placeholder, match);
        return placeholder;
      });
    }

    return new ProtectedText(protectedText, marker, spans);
  }

  private pickMarker(text: string): string {
    let tag = BASE_TAG;
    while (text.includes(`${OPEN}${tag}`)) tag += '_';
    return `${OPEN}${tag}`;
  }
}
