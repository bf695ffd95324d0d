import type { PanField } from '@pancard/shared-types';
import { DEFAULT_HEADER_DENYLIST, DEFAULT_HOLDER_TYPES } from './constants/extraction.constants';
import { ExtractionErrorCode, ExtractionException } from './exceptions/extraction.exception';
import type {
  ExtractedFields,
  ExtractionOptions,
  ExtractionResult,
  LayerTrace,
} from './interfaces/extraction-result.interface';
import type { ExtractionLayer } from './layers/extraction-layer';
import { heuristicLayer } from './layers/heuristic.layer';
import { layoutLayer } from './layers/layout.layer';
import { panNumberLayer } from './layers/pan-number.layer';
import { createTranscript } from './transcript';

/** Highest priority first. */
export const EXTRACTION_LAYERS: readonly ExtractionLayer[] = [panNumberLayer, layoutLayer, heuristicLayer];

const FIELD_ORDER: readonly PanField[] = ['name', 'father_name', 'pan_number'];

export function buildExtractionOptions(extraHeaderPhrases: readonly string[] = []): ExtractionOptions {
  return {
    headerDenylist: [...DEFAULT_HEADER_DENYLIST, ...extraHeaderPhrases],
    holderTypeCodes: new Set(DEFAULT_HOLDER_TYPES.map((holderType) => holderType.code)),
  };
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = buildExtractionOptions();

/**
 * Copies proposed values into `current` for fields that are still absent.
 * Empty strings are treated as absent.
 */
export function mergeAbsent(
  current: ExtractedFields,
  proposed: ExtractedFields,
): { merged: ExtractedFields; trace: Omit<LayerTrace, 'layer'> } {
  const merged: ExtractedFields = { ...current };
  const trace: Omit<LayerTrace, 'layer'> = { proposed: [], written: [], discarded: [] };

  for (const field of FIELD_ORDER) {
    const value = proposed[field];
    if (!value) {
      continue;
    }
    trace.proposed.push(field);
    if (merged[field] === undefined) {
      merged[field] = value;
      trace.written.push(field);
    } else {
      trace.discarded.push(field);
    }
  }
  return { merged, trace };
}

/**
 * Runs every extraction layer over one OCR transcript and returns the merged,
 * frozen result. Missing fields are left absent; only a non-string transcript
 * is rejected.
 */
export function extractFields(
  text: string | null | undefined,
  options: ExtractionOptions = DEFAULT_EXTRACTION_OPTIONS,
  onLayer?: (trace: LayerTrace) => void,
  layers: readonly ExtractionLayer[] = EXTRACTION_LAYERS,
): ExtractionResult {
  if (typeof text !== 'string') {
    throw new ExtractionException(
      `Transcript must be a string, received ${text === null ? 'null' : typeof text}`,
      ExtractionErrorCode.MALFORMED_TRANSCRIPT,
    );
  }

  const transcript = createTranscript(text);
  let fields: ExtractedFields = {};
  for (const layer of layers) {
    const { merged, trace } = mergeAbsent(fields, layer.extract(transcript, fields, options));
    fields = merged;
    onLayer?.({ layer: layer.id, ...trace });
  }

  return Object.freeze({ ...fields, raw_text: transcript.text });
}
