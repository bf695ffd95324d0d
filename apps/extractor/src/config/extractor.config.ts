import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { dirname, join } from 'path';

/** Trained data shipped with `@tesseract.js-data/eng` (LSTM, integer model). */
export const BUNDLED_LANG_DATA_DIR = '4.0.0_best_int';

export function bundledLangPath(): string {
  return join(dirname(require.resolve('@tesseract.js-data/eng/package.json')), BUNDLED_LANG_DATA_DIR);
}

export interface OcrSettings {
  language: string;
  langPath: string;
  maxImageDimension: number;
  medianWindow: number;
}

/**
 * Typed view over the validated environment.
 *
 * @remarks
 * **Environment Variables**:
 * - OCR_LANGUAGE: tesseract language code (default `eng`)
 * - OCR_LANG_PATH: directory holding `.traineddata.gz` files; defaults to
 *   the English data bundled with `@tesseract.js-data/eng`. Required for any
 *   other language
 * - OCR_MAX_IMAGE_DIMENSION: images larger than this are scaled down
 * - OCR_MEDIAN_WINDOW: median filter window used for noise reduction
 * - EXTRACTION_EXTRA_HEADER_PHRASES: comma-separated phrases added to the
 *   header denylist of the fallback name heuristic
 */
@Injectable()
export class ExtractorConfigService {
  private readonly ocr: OcrSettings;
  private readonly extraHeaderPhrases: string[];

  constructor(private readonly configService: ConfigService) {
    const langPath = this.configService.get<string>('OCR_LANG_PATH');
    this.ocr = {
      language: this.configService.get<string>('OCR_LANGUAGE', 'eng'),
      langPath: langPath ? langPath : bundledLangPath(),
      maxImageDimension: Number(this.configService.get<string | number>('OCR_MAX_IMAGE_DIMENSION', 2048)),
      medianWindow: Number(this.configService.get<string | number>('OCR_MEDIAN_WINDOW', 3)),
    };
    this.extraHeaderPhrases = this.configService
      .get<string>('EXTRACTION_EXTRA_HEADER_PHRASES', '')
      .split(',')
      .map((phrase) => phrase.trim())
      .filter((phrase) => phrase.length > 0);
  }

  getOcrSettings(): OcrSettings {
    return this.ocr;
  }

  getExtraHeaderPhrases(): readonly string[] {
    return this.extraHeaderPhrases;
  }
}
