import type { Transcript } from '../transcript';
import type { ExtractedFields, ExtractionOptions } from '../interfaces/extraction-result.interface';

/**
 * One extraction strategy. Layers only propose values; whether a proposal is
 * kept is decided by the merge step in `extractFields`.
 */
export interface ExtractionLayer {
  readonly id: string;
  extract(
    transcript: Transcript,
    current: Readonly<ExtractedFields>,
    options: ExtractionOptions,
  ): ExtractedFields;
}
