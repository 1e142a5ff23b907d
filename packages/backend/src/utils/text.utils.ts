import { ABSENT_MARKERS } from '../config/constants';

/**
 * True for null/undefined, blank strings and the textual "no value" markers
 * (`not detected`, `none`, `null`, ...). Case-insensitive.
 */
export function isAbsentValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  return ABSENT_MARKERS.has(String(value).trim().toLowerCase());
}

/** Text or '' for anything absent. */
export function safeString(value: unknown): string {
  if (isAbsentValue(value)) return '';
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value).trim();
  }
  return '';
}

/** Lower case, trimmed, single spaces: 'Blusa para Dama   ' -> 'blusa para dama'. */
export function normalizeDescription(description: string | null | undefined): string {
  if (!description) return '';
  return description.toLowerCase().trim().split(/\s+/).join(' ');
}

const ACCENTS: Record<string, string> = {
  á: 'a',
  é: 'e',
  í: 'i',
  ó: 'o',
  ú: 'u',
  ü: 'u',
  ñ: 'n',
};

/** Key used to compare column headers: lower case, no accents, punctuation or spaces. */
export function normalizeHeader(text: string): string {
  return text
    .toLowerCase()
    .replace(/[áéíóúüñ]/g, (ch) => ACCENTS[ch] ?? ch)
    .replace(/[\s\-_.,()/#]/g, '');
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes < 1024) return `${sizeBytes} B`;
  if (sizeBytes < 1024 * 1024) return `${(sizeBytes / 1024).toFixed(1)} KB`;
  return `${(sizeBytes / (1024 * 1024)).toFixed(1)} MB`;
}
