/**
 * Fields extracted from a PAN card transcript. Keys follow the JSON record
 * consumed downstream, hence snake_case.
 */
export type PanField = 'name' | 'father_name' | 'pan_number';

/**
 * Serialized extraction output. Absent fields are `null`; `raw_text` is the
 * OCR transcript exactly as it was received.
 */
export interface PanExtractionRecord {
  name: string | null;
  father_name: string | null;
  pan_number: string | null;
  raw_text: string;
}

/**
 * Category of the PAN holder, encoded as the 4th character of the number.
 */
export interface PanHolderType {
  code: string;
  description: string;
}
