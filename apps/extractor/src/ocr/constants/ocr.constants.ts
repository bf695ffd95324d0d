export const DEFAULT_BINARIZATION_THRESHOLD = 128;
export const GRAYSCALE_LEVELS = 256;
export const UNSUPPORTED_DOCUMENT_EXTENSIONS = ['.pdf'];
