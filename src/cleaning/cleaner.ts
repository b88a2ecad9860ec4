export type CleanerInput = {
  source: string; // "news" | "ncert" | "ocr" | whatever the caller scraped
  title?: string;
  rawText: string;
};

export interface Cleaner {
  clean(input: CleanerInput): string;
}
