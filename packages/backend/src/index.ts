import { config } from './config';
import { GeminiExtractor, GeminiTranslator } from './services/ai-extraction.service';
import { BatchRegistry } from './services/batchScheduler.service';
import { CatalogService } from './services/catalog.service';
import { ImportPipeline } from './services/importPipeline.service';
import { SchedulerOptions } from './types/batch.types';
import { DocumentExtractor, Translator } from './types/extraction.types';

export * from './config/constants';
export { FIELD_CATALOGUE } from './config/fields';
export * from './types/batch.types';
export * from './types/extraction.types';
export * from './types/shipment.types';
export * from './types/validation.types';
export * from './utils/errors';
export { parseLooseNumber } from './utils/number.utils';
export { FieldValidator, fieldValidator } from './services/fieldValidator.service';
export { reconcileParty } from './services/partyReconciler.service';
export {
  allocateCosts,
  finalizeShipment,
  recalculateShipment,
  summarizeAllocation,
} from './services/costAllocation.service';
export { BatchRegistry, calculateProgress } from './services/batchScheduler.service';
export {
  consolidateShipment,
  createSnapshot,
  restoreSnapshot,
  toValidationDocument,
} from './services/shipment.service';
export { CatalogService, detectCatalogColumns } from './services/catalog.service';
export { ImportPipeline, buildReportPayload } from './services/importPipeline.service';
export { GeminiExtractor, GeminiTranslator } from './services/ai-extraction.service';

export interface ImportAssistantOptions {
  extractor?: DocumentExtractor;
  translator?: Translator | null;
  scheduler?: Partial<SchedulerOptions>;
  catalogPath?: string;
}

export interface ImportAssistant {
  registry: BatchRegistry;
  pipeline: ImportPipeline;
  catalog: CatalogService;
}

/**
 * Wires the default collaborators. Without an explicit extractor the
 * Gemini adapter is used, which needs GEMINI_API_KEY.
 */
export function createImportAssistant(options: ImportAssistantOptions = {}): ImportAssistant {
  const extractor = options.extractor ?? new GeminiExtractor();
  const translator =
    options.translator !== undefined
      ? options.translator
      : config.translateDescriptions
        ? new GeminiTranslator()
        : null;

  const registry = new BatchRegistry(extractor, options.scheduler);
  return {
    registry,
    pipeline: new ImportPipeline(registry, translator),
    catalog: CatalogService.fromFile(options.catalogPath),
  };
}
