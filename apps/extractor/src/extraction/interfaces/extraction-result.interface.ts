import type { PanField } from '@pancard/shared-types';

export type ExtractedFields = Partial<Record<PanField, string>>;

export interface ExtractionResult extends Readonly<ExtractedFields> {
  readonly raw_text: string;
}

export interface ExtractionOptions {
  /** Phrases that mark a line as card header text rather than a name. */
  headerDenylist: readonly string[];
  /** Valid 4th-character PAN holder-type codes. */
  holderTypeCodes: ReadonlySet<string>;
}

/**
 * Outcome of a single layer: what it proposed, which of those fields were
 * written, and which were dropped because a higher-priority layer already set them.
 */
export interface LayerTrace {
  layer: string;
  proposed: PanField[];
  written: PanField[];
  discarded: PanField[];
}
