import path from 'path';
import { FILE_EXTENSION_TO_FORMAT, FILE_EXTENSION_TO_MIME, FileFormat } from '../config/constants';
import { formatFileSize } from './text.utils';

export interface FileCheck {
  valid: boolean;
  format: FileFormat | null;
  mimeType: string | null;
  size: string;
  error?: string;
}

export function getFileExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase().slice(1);
}

export function getFileFormat(fileName: string): FileFormat | null {
  return FILE_EXTENSION_TO_FORMAT[getFileExtension(fileName)] ?? null;
}

/** Size and extension check done before a file is sent for extraction. */
export function validateFile(
  fileName: string,
  sizeBytes: number,
  limits: { maxFileSize: number; allowedFileTypes: string[] }
): FileCheck {
  const size = formatFileSize(sizeBytes);
  const ext = getFileExtension(fileName);

  if (sizeBytes > limits.maxFileSize) {
    return {
      valid: false,
      format: null,
      mimeType: null,
      size,
      error: `File too large (${size}). Maximum allowed: ${formatFileSize(limits.maxFileSize)}`,
    };
  }

  if (sizeBytes === 0) {
    return { valid: false, format: null, mimeType: null, size, error: 'File is empty' };
  }

  const format = FILE_EXTENSION_TO_FORMAT[ext];
  if (!format || !limits.allowedFileTypes.includes(ext)) {
    return {
      valid: false,
      format: null,
      mimeType: null,
      size,
      error: `Unsupported file type: ${ext || 'none'}. Use: ${limits.allowedFileTypes.join(', ').toUpperCase()}`,
    };
  }

  return { valid: true, format, mimeType: FILE_EXTENSION_TO_MIME[ext] ?? null, size };
}
