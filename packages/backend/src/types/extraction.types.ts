import { DocumentKind, FileFormat } from '../config/constants';
import { ExtractedPayload } from './batch.types';

export interface ExtractionRequest {
  fileName: string;
  content: Buffer;
  fileFormat: FileFormat;
  mimeType: string;
}

/** Which document shape the extraction service should return. */
export interface FieldSchemaHint {
  documentKind: DocumentKind;
}

export interface ExtractOptions {
  signal?: AbortSignal;
}

export type ExtractionErrorResponse = { error: string };

/**
 * Remote structured-data extraction. Slow and fallible; the batch scheduler
 * records any thrown error or `{ error }` response as a per-file failure.
 */
export interface DocumentExtractor {
  extract(
    request: ExtractionRequest,
    hint: FieldSchemaHint,
    options?: ExtractOptions
  ): Promise<ExtractedPayload | ExtractionErrorResponse>;
}

/** Returns the translated text, or the original text tagged with TRANSLATION_ERROR_PREFIX. */
export interface Translator {
  translate(text: string): Promise<string>;
}
