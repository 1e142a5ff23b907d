import { GenerativeModel, GoogleGenerativeAI, Part } from '@google/generative-ai';
import { config } from '../config';
import { DocumentKind, FileFormat, TRANSLATION_ERROR_PREFIX } from '../config/constants';
import { ExtractedPayload } from '../types/batch.types';
import {
  DocumentExtractor,
  ExtractOptions,
  ExtractionErrorResponse,
  ExtractionRequest,
  FieldSchemaHint,
  Translator,
} from '../types/extraction.types';
import { delay } from '../utils/async.utils';
import { ExtractionFailure, getErrorMessage } from '../utils/errors';
import { isPlainObject, safeJsonParse } from '../utils/json.utils';
import { isAbsentValue } from '../utils/text.utils';
import { extractPdfText, hasUsableText } from './pdfText.service';

const RETRY_CONFIG = {
  maxRetries: 3,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

function isRateLimitError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('quota') ||
      message.includes('429') ||
      message.includes('resource exhausted')
    );
  }
  return false;
}

/** Retries only rate-limit errors, with exponential backoff. */
async function callWithRetry<T>(
  fn: () => Promise<T>,
  context: string,
  signal?: AbortSignal
): Promise<T> {
  let lastError: Error | null = null;
  let delayMs = RETRY_CONFIG.initialDelayMs;

  for (let attempt = 1; attempt <= RETRY_CONFIG.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRateLimitError(error)) throw error;

      console.log(
        `[AI Extraction] Rate limit hit for ${context}. ` +
          `Attempt ${attempt}/${RETRY_CONFIG.maxRetries}. ` +
          `Waiting ${delayMs / 1000}s...`
      );
      if (attempt < RETRY_CONFIG.maxRetries) {
        await delay(delayMs, signal);
        delayMs = Math.min(delayMs * RETRY_CONFIG.backoffMultiplier, RETRY_CONFIG.maxDelayMs);
      }
    }
  }

  throw lastError ?? new Error('Max retries exceeded');
}

const RESPONSE_RULES = `Rules:
1. Reply with ONE valid JSON object and nothing else: no explanations, no summaries.
2. Wrap the JSON in a \`\`\`json code block.
3. Use null for any field that is not in the document.
4. Numeric fields must be numbers, not strings.`;

export const EXTRACTION_PROMPTS: Record<DocumentKind, string> = {
  [DocumentKind.BILL_OF_LADING]: `Task: extract every key field of a Bill of Lading for an import report.
You are a data-extraction API; your only output is JSON.
${RESPONSE_RULES}
5. For "exporter" and "consignee" extract the full name, full postal address and phone number when present.

Required JSON shape:
\`\`\`json
{
  "bl_number": "...",
  "booking_number": "...",
  "container_no": "...",
  "vessel_voyage": "...",
  "port_of_loading": "...",
  "port_of_discharge": "...",
  "place_of_delivery": "...",
  "date_laden_on_board": "...",
  "cargo_type": "...",
  "freight_cost": 0.00,
  "packages_count": 0,
  "gross_weight": 0.00,
  "gross_measurement": 0.00,
  "exporter": { "name": "...", "address": "...", "phone": "..." },
  "consignee": { "name": "...", "address": "...", "phone": "..." }
}
\`\`\``,

  [DocumentKind.COMMERCIAL_INVOICE]: `Task: extract every key field and the item table of a Commercial Invoice for an import report.
You are a data-extraction API; your only output is JSON.
${RESPONSE_RULES}
5. INCOTERM: look for it with high priority (FOB, CIF, ...). If it is not present use "NOT_FOUND".
6. CURRENCY: the ISO currency code (USD, EUR, ...).
7. ITEMS: "description" is a readable combination of product description, style and color.

Required JSON shape:
\`\`\`json
{
  "invoice_number": "...",
  "invoice_date": "...",
  "incoterm": "...",
  "currency": "...",
  "total_value": 0.00,
  "shipping_cost_invoice": 0.00,
  "exporter": { "name": "...", "address": "...", "phone": "..." },
  "consignee": { "name": "...", "address": "...", "phone": "..." },
  "items": [
    { "part_number": "...", "description": "...", "quantity": 0, "unit_price": 0.00, "total_price": 0.00 }
  ]
}
\`\`\``,
};

/**
 * Extraction collaborator backed by Gemini. PDFs with a text layer are sent
 * as text; scans and images are sent inline.
 */
export class GeminiExtractor implements DocumentExtractor {
  private readonly model: GenerativeModel;

  constructor(apiKey: string = config.geminiApiKey, modelName: string = config.geminiModel) {
    if (!apiKey) {
      throw new ExtractionFailure('GEMINI_API_KEY is not set; AI extraction is unavailable');
    }
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({
      model: modelName,
      generationConfig: { temperature: 0.1 },
    });
  }

  private async buildContent(request: ExtractionRequest, prompt: string): Promise<Array<string | Part>> {
    if (request.fileFormat === FileFormat.PDF) {
      const text = await extractPdfText(request.content);
      if (hasUsableText(text)) {
        console.log(`[AI Extraction] ${request.fileName}: using the PDF text layer`);
        return [
          `${prompt}\n\n--- DOCUMENT TEXT START ---\n${text}\n--- DOCUMENT TEXT END ---`,
        ];
      }
    }

    console.log(`[AI Extraction] ${request.fileName}: sending the file as ${request.mimeType}`);
    return [
      prompt,
      { inlineData: { data: request.content.toString('base64'), mimeType: request.mimeType } },
    ];
  }

  async extract(
    request: ExtractionRequest,
    hint: FieldSchemaHint,
    options: ExtractOptions = {}
  ): Promise<ExtractedPayload | ExtractionErrorResponse> {
    const prompt = EXTRACTION_PROMPTS[hint.documentKind];
    const content = await this.buildContent(request, prompt);

    const text = await callWithRetry(
      async () => {
        const result = await this.model.generateContent(content, { signal: options.signal });
        return result.response.text();
      },
      request.fileName,
      options.signal
    );

    const parsed = safeJsonParse(text);
    if (!parsed || !isPlainObject(parsed.data)) {
      console.error(`[AI Extraction] No JSON object in response for ${request.fileName}`);
      return { error: `The AI response was not a JSON object: ${text.substring(0, 500)}` };
    }

    console.log(`[AI Extraction] ${request.fileName}: JSON parsed using ${parsed.method}`);
    return parsed.data;
  }
}

/** Item-description translation backed by Gemini. */
export class GeminiTranslator implements Translator {
  private readonly model: GenerativeModel;

  constructor(
    apiKey: string = config.geminiApiKey,
    modelName: string = config.geminiModel,
    private readonly targetLanguage: string = config.translationTargetLanguage
  ) {
    if (!apiKey) {
      throw new ExtractionFailure('GEMINI_API_KEY is not set; translation is unavailable');
    }
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  }

  async translate(text: string): Promise<string> {
    if (isAbsentValue(text)) return text;

    const prompt =
      `Translate the following product description into ${this.targetLanguage}. ` +
      `Return ONLY the translation: '${text}'`;

    try {
      const result = await this.model.generateContent(prompt);
      return result.response.text().trim().replace(/[*"]/g, '');
    } catch (error) {
      console.error(`[AI Translation] ${getErrorMessage(error)}`);
      return `${TRANSLATION_ERROR_PREFIX} ${text}`;
    }
  }
}
