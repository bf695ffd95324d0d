import { Module } from '@nestjs/common';
import { ExtractionModule } from '../extraction/extraction.module';
import { OcrService } from './ocr.service';

@Module({
  imports: [ExtractionModule],
  providers: [OcrService],
  exports: [OcrService],
})
export class OcrModule {}
