import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { FieldExtractorService } from '../extraction/field-extractor.service';
import type { ExtractionResult } from '../extraction/interfaces/extraction-result.interface';
import { serializeResults } from '../extraction/serialize';
import { OcrService } from '../ocr/ocr.service';
import { CliArgs } from './cli-args';

export const STDIN_SOURCE = '-';

@Injectable()
export class ExtractRunnerService {
  private readonly logger = new Logger(ExtractRunnerService.name);

  constructor(
    private readonly ocrService: OcrService,
    private readonly fieldExtractor: FieldExtractorService,
  ) {}

  /**
   * Runs extraction for the parsed command line and returns the JSON to print.
   * Images are processed one after another; the first failure aborts the run.
   */
  async run(args: CliArgs, stdin: AsyncIterable<string | Buffer> = process.stdin): Promise<string> {
    const results: ExtractionResult[] = [];
    if (args.transcript !== undefined) {
      const text = await this.readTranscript(args.transcript, stdin);
      results.push(this.fieldExtractor.extract(text));
    } else {
      for (const image of args.images) {
        this.logger.log(`Processing ${image}`);
        results.push(await this.ocrService.extractFromImage(image));
      }
    }
    return serializeResults(results, !args.compact);
  }

  private async readTranscript(source: string, stdin: AsyncIterable<string | Buffer>): Promise<string> {
    if (source !== STDIN_SOURCE) {
      return readFile(source, 'utf8');
    }
    const chunks: Buffer[] = [];
    for await (const chunk of stdin) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
  }
}
