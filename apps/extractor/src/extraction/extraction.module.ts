import { Module } from '@nestjs/common';
import { FieldExtractorService } from './field-extractor.service';

@Module({
  providers: [FieldExtractorService],
  exports: [FieldExtractorService],
})
export class ExtractionModule {}
