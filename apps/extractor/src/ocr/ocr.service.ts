import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import sharp from 'sharp';
import { createWorker, OEM, PSM, Worker } from 'tesseract.js';
import { ExtractorConfigService } from '../config/extractor.config';
import { FieldExtractorService } from '../extraction/field-extractor.service';
import type { ExtractionResult } from '../extraction/interfaces/extraction-result.interface';
import { UNSUPPORTED_DOCUMENT_EXTENSIONS } from './constants/ocr.constants';
import { OcrErrorCode, OcrException } from './exceptions/ocr.exception';
import { RecognizedText } from './interfaces/ocr-result.interface';
import { buildGrayHistogram, otsuThreshold } from './utils/otsu-threshold';

type RawChannels = 1 | 2 | 3 | 4;

function isRawChannels(channels: number): channels is RawChannels {
  return channels === 1 || channels === 2 || channels === 3 || channels === 4;
}

function toRawChannels(channels: number): RawChannels {
  if (!isRawChannels(channels)) {
    throw new OcrException(
      `Unsupported channel count ${channels}`,
      OcrErrorCode.PREPROCESSING_FAILED,
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
  return channels;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class OcrService {
  private readonly logger = new Logger(OcrService.name);

  constructor(
    private readonly configService: ExtractorConfigService,
    private readonly fieldExtractor: FieldExtractorService,
  ) {}

  /**
   * Runs the full pipeline for one card image: read, binarize, recognize, extract.
   * @param imagePath Path to a raster image (PNG, JPEG, TIFF, WebP...).
   * @throws OcrException when the file is a PDF, cannot be read, or recognition fails.
   */
  async extractFromImage(imagePath: string): Promise<ExtractionResult> {
    this.ensureNotPdf(imagePath);

    let buffer: Buffer;
    try {
      buffer = await readFile(imagePath);
    } catch (err: unknown) {
      this.logger.error(`Cannot read ${imagePath}: ${errorMessage(err)}`);
      throw new OcrException(
        `Cannot read image ${imagePath}`,
        OcrErrorCode.DOCUMENT_READ_FAILED,
        HttpStatus.NOT_FOUND,
      );
    }

    const processed = await this.preprocessImage(buffer);
    const { text, confidence } = await this.recognizeText(processed);
    this.logger.log(`Recognized ${imagePath} (confidence ${confidence})`);

    return this.fieldExtractor.extract(text);
  }

  /**
   * Produces a black-and-white image for recognition: grayscale, median
   * denoise (keeps stroke edges), downscale when oversize, then a global
   * threshold picked from the image's own histogram.
   * @returns PNG buffer.
   */
  async preprocessImage(buffer: Buffer): Promise<Buffer> {
    const { maxImageDimension, medianWindow } = this.configService.getOcrSettings();
    try {
      const { data, info } = await sharp(buffer)
        .grayscale()
        .median(medianWindow)
        .resize(maxImageDimension, maxImageDimension, { fit: 'inside', withoutEnlargement: true })
        .raw()
        .toBuffer({ resolveWithObject: true });

      const threshold = otsuThreshold(buildGrayHistogram(data, info.channels));
      this.logger.debug(`Binarizing ${info.width}x${info.height} image at threshold ${threshold}`);

      return await sharp(data, {
        raw: { width: info.width, height: info.height, channels: toRawChannels(info.channels) },
      })
        .threshold(threshold)
        .png()
        .toBuffer();
    } catch (err: unknown) {
      if (err instanceof OcrException) {
        throw err;
      }
      this.logger.error(`Image preprocessing failed: ${errorMessage(err)}`);
      throw new OcrException(
        'Image preprocessing failed',
        OcrErrorCode.PREPROCESSING_FAILED,
        HttpStatus.UNPROCESSABLE_ENTITY,
      );
    }
  }

  /**
   * Recognizes the image as a single uniform block of text.
   */
  async recognizeText(image: Buffer): Promise<RecognizedText> {
    const { language, langPath } = this.configService.getOcrSettings();
    let worker: Worker | undefined;
    try {
      worker = await createWorker(language, OEM.LSTM_ONLY, { langPath });
      await worker.setParameters({ tessedit_pageseg_mode: PSM.SINGLE_BLOCK });
      const { data } = await worker.recognize(image);
      return { text: data.text, confidence: data.confidence };
    } catch (err: unknown) {
      this.logger.error(`OCR failed: ${errorMessage(err)}`);
      throw new OcrException('OCR processing failed', OcrErrorCode.OCR_FAILED, HttpStatus.BAD_GATEWAY);
    } finally {
      await worker?.terminate();
    }
  }

  private ensureNotPdf(imagePath: string) {
    if (UNSUPPORTED_DOCUMENT_EXTENSIONS.includes(extname(imagePath).toLowerCase())) {
      throw new OcrException(
        'PDF documents are not supported for OCR; please provide an image',
        OcrErrorCode.VALIDATION_FAILED,
        HttpStatus.UNSUPPORTED_MEDIA_TYPE,
      );
    }
  }
}
