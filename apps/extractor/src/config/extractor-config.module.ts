import { Global, Module } from '@nestjs/common';
import { ExtractorConfigService } from './extractor.config';

@Global()
@Module({
  providers: [ExtractorConfigService],
  exports: [ExtractorConfigService],
})
export class ExtractorConfigModule {}
