import { ExtractionErrorCode, ExtractionException } from './exceptions/extraction.exception';
import {
  DEFAULT_EXTRACTION_OPTIONS,
  EXTRACTION_LAYERS,
  extractFields,
  mergeAbsent,
} from './field-extractor';
import type { LayerTrace } from './interfaces/extraction-result.interface';
import type { ExtractionLayer } from './layers/extraction-layer';
import { serializeResults, toRecord } from './serialize';

const STANDARD_CARD = [
  'GOVT OF INDIA',
  'INCOME TAX DEPARTMENT',
  'RAHUL GUPTA',
  'SURESH GUPTA',
  '01/01/1990',
  'ABCDE1234F',
].join('\n');

describe('extractFields', () => {
  it('should extract every field from a standard card', () => {
    expect(extractFields(STANDARD_CARD)).toEqual({
      name: 'RAHUL GUPTA',
      father_name: 'SURESH GUPTA',
      pan_number: 'ABCDE1234F',
      raw_text: STANDARD_CARD,
    });
  });

  it('should fall back to name-like lines when the header is missing', () => {
    const text = 'GOVT OF INDIA\nPERMANENT ACCOUNT NUMBER\nRAHUL GUPTA\nSURESH GUPTA\n01/01/1990\nPAN ABCDE1234F';
    expect(extractFields(text)).toEqual({
      name: 'RAHUL GUPTA',
      father_name: 'SURESH GUPTA',
      pan_number: 'ABCDE1234F',
      raw_text: text,
    });
  });

  it('should return only raw_text for an empty transcript', () => {
    expect(toRecord(extractFields(''))).toEqual({
      name: null,
      father_name: null,
      pan_number: null,
      raw_text: '',
    });
  });

  it('should reject null and undefined transcripts', () => {
    expect(() => extractFields(null)).toThrow(ExtractionException);
    expect(() => extractFields(undefined)).toThrow('Transcript must be a string, received undefined');
    try {
      extractFields(null);
    } catch (err: unknown) {
      expect(err).toMatchObject({ code: ExtractionErrorCode.MALFORMED_TRANSCRIPT });
    }
  });

  it('should uppercase the pan number but keep name casing', () => {
    const text = 'income tax department\nRahul Gupta\nSuresh Gupta\nabcde1234f';
    expect(extractFields(text)).toMatchObject({
      name: 'Rahul Gupta',
      father_name: 'Suresh Gupta',
      pan_number: 'ABCDE1234F',
    });
  });

  it('should keep raw_text verbatim', () => {
    const text = '  INCOME TAX DEPARTMENT\r\nRAHUL GUPTA\r\nSURESH GUPTA\r\n';
    const result = extractFields(text);
    expect(result.raw_text).toBe(text);
    expect(result.name).toBe('RAHUL GUPTA');
  });

  it('should return a frozen result', () => {
    expect(Object.isFrozen(extractFields(STANDARD_CARD))).toBe(true);
  });

  it('should be idempotent', () => {
    const text = 'RAVI KUMAR\nINCOME TAX DEPARTMENT\nANITA SHARMA\nXYZAB1234C';
    expect(extractFields(text)).toEqual(extractFields(text));
  });

  it('should fill father_name from the fallback when the header layout leaves it blank', () => {
    const result = extractFields('INCOME TAX DEPARTMENT\nRAHUL GUPTA\n\nSURESH GUPTA');
    expect(result.name).toBe('RAHUL GUPTA');
    expect(result.father_name).toBe('SURESH GUPTA');
  });

  it('should not skip past the best fallback candidate for father_name', () => {
    const result = extractFields('INCOME TAX DEPARTMENT\nRAHUL GUPTA\n\nSURESH GUPTA\nMUMBAI MAHARASHTRA');
    expect(result.name).toBe('RAHUL GUPTA');
    expect(result.father_name).toBe('SURESH GUPTA');
  });

  it('should let the header-based name win and fill the rest from the fallback', () => {
    const traces: LayerTrace[] = [];
    const result = extractFields(
      'RAVI KUMAR\nINCOME TAX DEPARTMENT\nANITA SHARMA',
      DEFAULT_EXTRACTION_OPTIONS,
      (trace) => traces.push(trace),
    );

    expect(result.name).toBe('ANITA SHARMA');
    expect(result.father_name).toBe('RAVI KUMAR');
    expect(traces).toEqual([
      { layer: 'pan-number', proposed: [], written: [], discarded: [] },
      { layer: 'layout', proposed: ['name'], written: ['name'], discarded: [] },
      { layer: 'heuristic', proposed: ['father_name'], written: ['father_name'], discarded: [] },
    ]);
  });

  it('should never overwrite the pan number from a later layer', () => {
    const lateLayer: ExtractionLayer = {
      id: 'late',
      extract: () => ({ pan_number: 'ZZZZZ9999Z', father_name: 'LATE FATHER' }),
    };
    const result = extractFields(STANDARD_CARD, DEFAULT_EXTRACTION_OPTIONS, undefined, [
      ...EXTRACTION_LAYERS,
      lateLayer,
    ]);
    expect(result.pan_number).toBe('ABCDE1234F');
    expect(result.father_name).toBe('SURESH GUPTA');
  });
});

describe('mergeAbsent', () => {
  it('should only write absent, non-empty fields', () => {
    const { merged, trace } = mergeAbsent(
      { pan_number: 'ABCDE1234F' },
      { name: '', father_name: 'SURESH GUPTA', pan_number: 'PQRSX5678Z' },
    );
    expect(merged).toEqual({ pan_number: 'ABCDE1234F', father_name: 'SURESH GUPTA' });
    expect(trace).toEqual({ proposed: ['father_name', 'pan_number'], written: ['father_name'], discarded: ['pan_number'] });
  });

  it('should not mutate the current fields', () => {
    const current = { name: 'RAHUL GUPTA' };
    mergeAbsent(current, { father_name: 'SURESH GUPTA' });
    expect(current).toEqual({ name: 'RAHUL GUPTA' });
  });
});

describe('serializeResults', () => {
  it('should emit the record keys in order with nulls for absent fields', () => {
    const json = serializeResults([extractFields('INCOME TAX DEPARTMENT\nRAHUL GUPTA')], false);
    expect(json).toBe(
      '{"name":"RAHUL GUPTA","father_name":null,"pan_number":null,"raw_text":"INCOME TAX DEPARTMENT\\nRAHUL GUPTA"}',
    );
  });

  it('should emit an array for several results', () => {
    const json = serializeResults([extractFields(''), extractFields('')], false);
    expect(json).toBe(
      '[{"name":null,"father_name":null,"pan_number":null,"raw_text":""},{"name":null,"father_name":null,"pan_number":null,"raw_text":""}]',
    );
  });

  it('should indent by two spaces by default', () => {
    expect(serializeResults([extractFields('')])).toBe(
      '{\n  "name": null,\n  "father_name": null,\n  "pan_number": null,\n  "raw_text": ""\n}',
    );
  });
});
