import pdfParse from 'pdf-parse';
import { getErrorMessage } from '../utils/errors';

/** Below this many characters a PDF is treated as a scan and sent as a file. */
export const MIN_TEXT_LENGTH = 150;

/** Embedded text layer of a PDF, or '' for scans and unreadable files. */
export async function extractPdfText(content: Buffer): Promise<string> {
  try {
    const result = await pdfParse(content);
    return result.text || '';
  } catch (error) {
    console.warn(`[PDF] Text layer unavailable: ${getErrorMessage(error)}`);
    return '';
  }
}

export function hasUsableText(text: string): boolean {
  return text.trim().length > MIN_TEXT_LENGTH;
}
