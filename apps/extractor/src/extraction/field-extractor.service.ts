import { Injectable, Logger } from '@nestjs/common';
import { ExtractorConfigService } from '../config/extractor.config';
import { buildExtractionOptions, extractFields } from './field-extractor';
import type { ExtractionOptions, ExtractionResult, LayerTrace } from './interfaces/extraction-result.interface';

@Injectable()
export class FieldExtractorService {
  private readonly logger = new Logger(FieldExtractorService.name);
  private readonly options: ExtractionOptions;

  constructor(private readonly configService: ExtractorConfigService) {
    this.options = buildExtractionOptions(this.configService.getExtraHeaderPhrases());
  }

  /**
   * Extracts name, father's name and PAN number from an OCR transcript.
   * @param transcript Raw OCR text; an empty string yields a result with every field absent.
   * @throws ExtractionException when the transcript is not a string.
   */
  extract(transcript: string | null | undefined): ExtractionResult {
    const result = extractFields(transcript, this.options, (trace) => this.logTrace(trace));
    const missing = (['name', 'father_name', 'pan_number'] as const).filter((field) => result[field] === undefined);
    if (missing.length > 0) {
      this.logger.warn(`Partial extraction; missing fields: ${missing.join(', ')}`);
    }
    return result;
  }

  private logTrace(trace: LayerTrace) {
    if (trace.proposed.length === 0) {
      this.logger.debug(`Layer ${trace.layer} found nothing`);
      return;
    }
    this.logger.debug(
      `Layer ${trace.layer} wrote [${trace.written.join(', ')}], discarded [${trace.discarded.join(', ')}]`,
    );
  }
}
