export enum DocumentKind {
  BILL_OF_LADING = 'BILL_OF_LADING',
  COMMERCIAL_INVOICE = 'COMMERCIAL_INVOICE',
}

export enum FileFormat {
  PDF = 'PDF',
  IMAGE = 'IMAGE',
}

export const FILE_EXTENSION_TO_FORMAT: Record<string, FileFormat> = {
  pdf: FileFormat.PDF,
  png: FileFormat.IMAGE,
  jpg: FileFormat.IMAGE,
  jpeg: FileFormat.IMAGE,
  tiff: FileFormat.IMAGE,
  bmp: FileFormat.IMAGE,
};

export const FILE_EXTENSION_TO_MIME: Record<string, string> = {
  pdf: 'application/pdf',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  tiff: 'image/tiff',
  bmp: 'image/bmp',
};

/** Normalized placeholder for a field that was not detected or not provided. */
export const ABSENT_VALUE = 'not detected';

/** Lower-cased spellings the extraction service and users produce for "no value". */
export const ABSENT_MARKERS: ReadonlySet<string> = new Set([
  '',
  'not detected',
  'no detectado',
  'none',
  'null',
  'undefined',
  'not_found',
]);

/** Insurance is always 1.5% of the item's FOB value. */
export const INSURANCE_RATE = 0.015;

export const INCOTERMS = ['FOB', 'CIF', 'EXW', 'CFR', 'DAP', 'DDP'] as const;

export const CURRENCIES = ['USD', 'EUR', 'COP', 'PEN', 'MXN', 'CLP', 'ARS'] as const;

/** Classification code returned when the catalogue has no match. */
export const PENDING_CLASSIFICATION = 'PENDING';

export const TRANSLATION_ERROR_PREFIX = 'TRANSLATION_ERROR:';
