export interface RecognizedText {
  text: string;
  /** Mean word confidence reported by the engine, 0-100. */
  confidence: number;
}
