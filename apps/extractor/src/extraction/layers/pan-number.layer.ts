import { PAN_HOLDER_TYPE_INDEX, PAN_TOKEN_PATTERN } from '../constants/extraction.constants';
import type { ExtractionLayer } from './extraction-layer';

/**
 * Returns every distinct PAN-shaped token in order of first appearance. The
 * search runs over the whole uppercased text, so tokens are found even when
 * OCR glued them to neighbouring words.
 */
export function findPanCandidates(text: string): string[] {
  const candidates = new Set<string>();
  for (const match of text.toUpperCase().matchAll(PAN_TOKEN_PATTERN)) {
    candidates.add(match[0]);
  }
  return [...candidates];
}

export function hasKnownHolderType(pan: string, holderTypeCodes: ReadonlySet<string>): boolean {
  return holderTypeCodes.has(pan.charAt(PAN_HOLDER_TYPE_INDEX));
}

/**
 * Prefers the first candidate with a recognised holder-type code and falls
 * back to the first candidate overall, since OCR can corrupt that character too.
 */
export function selectPanNumber(
  candidates: readonly string[],
  holderTypeCodes: ReadonlySet<string>,
): string | undefined {
  return candidates.find((pan) => hasKnownHolderType(pan, holderTypeCodes)) ?? candidates[0];
}

export const panNumberLayer: ExtractionLayer = {
  id: 'pan-number',
  extract(transcript, _current, options) {
    const panNumber = selectPanNumber(findPanCandidates(transcript.text), options.holderTypeCodes);
    return panNumber ? { pan_number: panNumber } : {};
  },
};
