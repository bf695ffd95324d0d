import { Module } from '@nestjs/common';
import { ExtractionModule } from '../extraction/extraction.module';
import { OcrModule } from '../ocr/ocr.module';
import { ExtractRunnerService } from './extract-runner.service';

@Module({
  imports: [ExtractionModule, OcrModule],
  providers: [ExtractRunnerService],
  exports: [ExtractRunnerService],
})
export class CliModule {}
