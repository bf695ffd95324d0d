import type { PanExtractionRecord } from '@pancard/shared-types';
import type { ExtractionResult } from './interfaces/extraction-result.interface';

export function toRecord(result: ExtractionResult): PanExtractionRecord {
  return {
    name: result.name ?? null,
    father_name: result.father_name ?? null,
    pan_number: result.pan_number ?? null,
    raw_text: result.raw_text,
  };
}

export function serializeResults(results: readonly ExtractionResult[], pretty = true): string {
  const records = results.map(toRecord);
  const payload = records.length === 1 ? records[0] : records;
  return JSON.stringify(payload, null, pretty ? 2 : undefined);
}
