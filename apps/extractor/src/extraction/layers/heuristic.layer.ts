import {
  NAME_CANDIDATE_MAX_LENGTH,
  NAME_CANDIDATE_MIN_LENGTH,
  NAME_CANDIDATE_MIN_TOKENS,
} from '../constants/extraction.constants';
import type { ExtractedFields } from '../interfaces/extraction-result.interface';
import { normalizeForMatch } from '../transcript';
import type { ExtractionLayer } from './extraction-layer';

const NAME_FIELDS = ['name', 'father_name'] as const;

export function isHeaderLine(line: string, headerDenylist: readonly string[]): boolean {
  const normalized = normalizeForMatch(line);
  return headerDenylist.some((phrase) => normalized.includes(normalizeForMatch(phrase)));
}

export function isNameCandidate(line: string, headerDenylist: readonly string[]): boolean {
  if (line.length < NAME_CANDIDATE_MIN_LENGTH || line.length > NAME_CANDIDATE_MAX_LENGTH) {
    return false;
  }
  if (line.split(/\s+/).length < NAME_CANDIDATE_MIN_TOKENS) {
    return false;
  }
  // dates, PAN tokens and card numbers
  if (/\d/.test(line)) {
    return false;
  }
  return !isHeaderLine(line, headerDenylist);
}

/**
 * Best-effort fallback for transcripts without a usable header line: lines
 * that look like full names fill the name fields still missing, in order
 * (name first, then father's name). Lines already used as a field value are
 * skipped. Precision is noticeably lower than the layout layer; address
 * lines on a badly degraded scan can be picked up.
 */
export const heuristicLayer: ExtractionLayer = {
  id: 'heuristic',
  extract(transcript, current, options) {
    const missing = NAME_FIELDS.filter((field) => current[field] === undefined);
    if (missing.length === 0) {
      return {};
    }
    const used = new Set([current.name, current.father_name]);
    const candidates = transcript.lines
      .map((line) => line.trim())
      .filter((line) => !used.has(line) && isNameCandidate(line, options.headerDenylist));

    const proposed: ExtractedFields = {};
    missing.forEach((field, index) => {
      const candidate = candidates[index];
      if (candidate !== undefined) {
        proposed[field] = candidate;
      }
    });
    return proposed;
  },
};
