import dotenv from 'dotenv';

dotenv.config();

function readInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  geminiApiKey: process.env.GEMINI_API_KEY || '',
  geminiModel: process.env.GEMINI_MODEL || 'gemini-2.5-flash',
  maxBatchFiles: readInt('MAX_BATCH_FILES', 50),
  maxConcurrentExtractions: readInt('MAX_CONCURRENT_EXTRACTIONS', 4),
  // 0 disables the per-file timeout
  extractionTimeoutMs: readInt('EXTRACTION_TIMEOUT_MS', 120000),
  maxFileSize: readInt('MAX_FILE_SIZE_MB', 10) * 1024 * 1024,
  allowedFileTypes: ['pdf', 'png', 'jpg', 'jpeg', 'tiff', 'bmp'],
  translateDescriptions: process.env.TRANSLATE_DESCRIPTIONS !== 'false',
  translationTargetLanguage: process.env.TRANSLATION_TARGET_LANGUAGE || 'Spanish',
};
