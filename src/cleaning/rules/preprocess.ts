import * as cheerio from 'cheerio';

const BLOCK_ELEMENTS = 'p, div, li, tr, h1, h2, h3, h4, h5, h6, blockquote';

/** Text content of a markup blob, one line per block element. */
export function htmlToText(markup: string): string {
  const $ = cheerio.load(markup);

  $('script, style, noscript').remove();
  $('br').replaceWith('\n');
  $(BLOCK_ELEMENTS).append('\n');

  return $.root().text();
}

export function decodeUnicodeEscapes(text: string): string {
  return text.replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) =>
    String.fromCharCode(parseInt(hex, 16)),
  );
}

export const DEFAULT_TERMINAL_MARKS: readonly string[] = ['।', '॥', '?', ',', '.'];

export function keepTerminatedLines(
  text: string,
  marks: readonly string[] = DEFAULT_TERMINAL_MARKS,
): string {
  return text
    .split('\n')
    .filter((line) => marks.some((mark) => line.endsWith(mark)))
    .join('\n');
}
