import { ANCHOR_TOKENS } from '../constants/extraction.constants';
import { normalizeForMatch, Transcript } from '../transcript';
import type { ExtractionLayer } from './extraction-layer';

export function isAnchorLine(line: string): boolean {
  const normalized = normalizeForMatch(line);
  return ANCHOR_TOKENS.every((token) => normalized.includes(token));
}

export function findAnchorIndex(transcript: Transcript): number {
  return transcript.lines.findIndex(isAnchorLine);
}

function lineAt(transcript: Transcript, index: number): string | undefined {
  const line = transcript.lines[index]?.trim();
  return line ? line : undefined;
}

/**
 * Standard cards print the header, then the holder's name, then the father's
 * name. Without a header line this layer proposes nothing.
 */
export const layoutLayer: ExtractionLayer = {
  id: 'layout',
  extract(transcript) {
    const anchor = findAnchorIndex(transcript);
    if (anchor < 0) {
      return {};
    }
    return {
      name: lineAt(transcript, anchor + 1),
      father_name: lineAt(transcript, anchor + 2),
    };
  },
};
