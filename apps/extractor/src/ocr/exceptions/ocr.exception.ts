import { HttpException, HttpStatus } from '@nestjs/common';

export enum OcrErrorCode {
  /** The recognition engine failed or could not start. */
  OCR_FAILED = 'OCR_FAILED',
  /** sharp could not decode or binarize the image. */
  PREPROCESSING_FAILED = 'PREPROCESSING_FAILED',
  DOCUMENT_READ_FAILED = 'DOCUMENT_READ_FAILED',
  /** Input rejected before reading, e.g. a PDF. */
  VALIDATION_FAILED = 'VALIDATION_FAILED',
}

/**
 * Failure of the image pipeline for one card. The status only classifies the
 * failure; the CLI prints `message` and exits non-zero.
 */
export class OcrException extends HttpException {
  constructor(
    message: string,
    readonly code: OcrErrorCode = OcrErrorCode.OCR_FAILED,
    status: HttpStatus = HttpStatus.BAD_REQUEST,
  ) {
    super({ error: 'OCR Error', code, message }, status);
  }
}
