/**
 * OCR output for one card. `text` is kept verbatim; `lines` is the same text
 * split on any line terminator, blank lines included, so line positions match
 * the printed layout.
 */
export interface Transcript {
  readonly text: string;
  readonly lines: readonly string[];
}

export function createTranscript(text: string): Transcript {
  return Object.freeze({
    text,
    lines: Object.freeze(text.split(/\r\n|\r|\n/)),
  });
}

/** Uppercases and collapses runs of whitespace, for comparisons only. */
export function normalizeForMatch(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toUpperCase();
}
