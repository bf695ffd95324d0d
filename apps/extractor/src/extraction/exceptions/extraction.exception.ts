import { HttpException, HttpStatus } from '@nestjs/common';

export enum ExtractionErrorCode {
  MALFORMED_TRANSCRIPT = 'MALFORMED_TRANSCRIPT',
}

/** Raised for transcripts that are not text at all; empty text is valid input. */
export class ExtractionException extends HttpException {
  constructor(
    message: string,
    readonly code: ExtractionErrorCode = ExtractionErrorCode.MALFORMED_TRANSCRIPT,
    status: HttpStatus = HttpStatus.BAD_REQUEST,
  ) {
    super({ error: 'Extraction Error', code, message }, status);
  }
}
