import 'reflect-metadata';
import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('should apply defaults for unset variables', () => {
    const env = validateEnvironment({});
    expect(env.OCR_LANGUAGE).toBe('eng');
    expect(env.OCR_MAX_IMAGE_DIMENSION).toBe(2048);
    expect(env.OCR_MEDIAN_WINDOW).toBe(3);
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.OCR_LANG_PATH).toBeUndefined();
  });

  it('should convert numeric strings', () => {
    const env = validateEnvironment({ OCR_MAX_IMAGE_DIMENSION: '1024', OCR_MEDIAN_WINDOW: '5' });
    expect(env.OCR_MAX_IMAGE_DIMENSION).toBe(1024);
    expect(env.OCR_MEDIAN_WINDOW).toBe(5);
  });

  it('should reject an even median window', () => {
    expect(() => validateEnvironment({ OCR_MEDIAN_WINDOW: '4' })).toThrow('Invalid environment configuration');
  });

  it('should reject a non-numeric image dimension', () => {
    expect(() => validateEnvironment({ OCR_MAX_IMAGE_DIMENSION: 'large' })).toThrow(
      'Invalid environment configuration',
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => validateEnvironment({ LOG_LEVEL: 'verbose' })).toThrow('Invalid environment configuration');
  });
});
