import fs from 'fs';
import path from 'path';
import { PENDING_CLASSIFICATION } from '../config/constants';
import { isPlainObject } from '../utils/json.utils';
import { normalizeDescription, normalizeHeader, safeString } from '../utils/text.utils';

const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../data/tariffCatalog.json');

/** Header keywords used to find the description and code columns of an imported sheet. */
const COLUMN_KEYWORDS = {
  description: ['description', 'descripcion', 'product', 'producto', 'item', 'mercancia'],
  code: ['code', 'codigo', 'tariff', 'arancel', 'hs', 'partida', 'posicion'],
};

export interface CatalogColumns {
  description: string | null;
  code: string | null;
}

/**
 * Picks the header that best matches each keyword list. An exact match
 * scores 100, each keyword contained in the header scores 10; a column
 * needs at least 10 to be chosen.
 */
export function detectCatalogColumns(headers: string[]): CatalogColumns {
  const pick = (target: string, keywords: string[]): string | null => {
    let best: string | null = null;
    let bestScore = 0;
    const normalizedKeywords = keywords.map(normalizeHeader);

    for (const header of headers) {
      const normalized = normalizeHeader(header);
      let score = 0;
      if (normalized === normalizeHeader(target)) {
        score = 100;
      } else {
        for (const keyword of normalizedKeywords) {
          if (keyword && normalized.includes(keyword)) score += 10;
        }
      }
      if (score > bestScore) {
        bestScore = score;
        best = header;
      }
    }

    return bestScore >= 10 ? best : null;
  };

  return {
    description: pick('description', COLUMN_KEYWORDS.description),
    code: pick('code', COLUMN_KEYWORDS.code),
  };
}

/** Product description -> tariff classification code, keyed by normalized description. */
export class CatalogService {
  private readonly entries = new Map<string, string>();

  constructor(initialEntries: Record<string, string> = {}) {
    this.loadEntries(initialEntries);
  }

  static fromFile(filePath: string = DEFAULT_CATALOG_PATH): CatalogService {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    const entries: Record<string, string> = {};
    if (isPlainObject(parsed)) {
      for (const [description, code] of Object.entries(parsed)) {
        if (typeof code === 'string') entries[description] = code;
      }
    }
    return new CatalogService(entries);
  }

  /** Adds or overwrites entries; returns how many were accepted. */
  loadEntries(entries: Record<string, string>): number {
    let accepted = 0;
    for (const [description, code] of Object.entries(entries)) {
      const key = normalizeDescription(description);
      const value = code.trim();
      if (!key || !value || value === PENDING_CLASSIFICATION) continue;
      this.entries.set(key, value);
      accepted++;
    }
    return accepted;
  }

  /** Imports spreadsheet-like rows; columns are detected from the first row's keys when omitted. */
  loadFromRows(rows: Array<Record<string, unknown>>, columns?: CatalogColumns): number {
    if (rows.length === 0) return 0;

    const { description, code } = columns ?? detectCatalogColumns(Object.keys(rows[0]));
    if (!description || !code) {
      console.warn('[Catalog] Description or code column not found; nothing imported');
      return 0;
    }

    const entries: Record<string, string> = {};
    for (const row of rows) {
      const text = safeString(row[description]);
      const value = safeString(row[code]);
      if (text && value) entries[text] = value;
    }

    const accepted = this.loadEntries(entries);
    console.log(`[Catalog] Imported ${accepted} entries (total ${this.entries.size})`);
    return accepted;
  }

  /** Exact match first, then the first catalogue key contained in the description. */
  getCode(description: string | null | undefined): string {
    const query = normalizeDescription(description);
    if (!query) return PENDING_CLASSIFICATION;

    const exact = this.entries.get(query);
    if (exact) return exact;

    for (const [key, code] of this.entries) {
      if (query.includes(key)) return code;
    }

    return PENDING_CLASSIFICATION;
  }

  getAllEntries(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }
}
