import { DocumentKind, PENDING_CLASSIFICATION } from '../config/constants';
import { Batch, BatchError, BatchFile, JobResult, RunOptions } from '../types/batch.types';
import { Translator } from '../types/extraction.types';
import { AllocationSummary, FinalizedShipment } from '../types/shipment.types';
import { DocumentValidationResult } from '../types/validation.types';
import { BatchRegistry } from './batchScheduler.service';
import { CatalogService } from './catalog.service';
import { summarizeAllocation } from './costAllocation.service';
import { fieldValidator } from './fieldValidator.service';
import { consolidateShipment, toValidationDocument } from './shipment.service';

export interface ShipmentImportResult {
  batchId: string;
  batch: Batch;
  /** null when the bill of lading could not be extracted */
  shipment: FinalizedShipment | null;
  errors: BatchError[];
}

export interface ClassifiedItem {
  invoiceNumber: string;
  partNumber: string;
  description: string;
  code: string;
}

export interface ReportPayload {
  shipment: FinalizedShipment;
  summary: AllocationSummary;
  validation: DocumentValidationResult;
  items: ClassifiedItem[];
  pendingClassifications: number;
}

function byFileIndex(a: JobResult, b: JobResult): number {
  return a.fileIndex - b.fileIndex;
}

/**
 * Drives one shipment from uploaded files to a consolidated record:
 * extraction batch, then party reconciliation and cost allocation.
 */
export class ImportPipeline {
  constructor(
    private readonly registry: BatchRegistry,
    private readonly translator: Translator | null = null
  ) {}

  /**
   * The bill of lading always runs as file 0. Invoices that fail extraction
   * are left out of the shipment and reported in `errors`.
   */
  async processShipment(
    name: string,
    billOfLading: BatchFile,
    invoices: BatchFile[],
    options: RunOptions = {}
  ): Promise<ShipmentImportResult> {
    const files: BatchFile[] = [
      { ...billOfLading, kind: DocumentKind.BILL_OF_LADING },
      ...invoices.map((file) => ({ ...file, kind: DocumentKind.COMMERCIAL_INVOICE })),
    ];

    const batchId = this.registry.createBatch(name, files);
    const batch = await this.registry.run(batchId, options);

    const results = [...batch.results].sort(byFileIndex);
    const blResult = results.find((result) => result.fileIndex === 0);
    if (!blResult) {
      console.warn(`[Pipeline] "${name}": bill of lading was not extracted; no shipment built`);
      return { batchId, batch, shipment: null, errors: batch.errors };
    }

    const invoicePayloads = results
      .filter((result) => result.fileIndex > 0)
      .map((result) => result.data);

    const shipment = await consolidateShipment(blResult.data, invoicePayloads, {
      translator: this.translator,
    });

    console.log(
      `[Pipeline] "${name}": ${invoicePayloads.length}/${invoices.length} invoice(s) consolidated`
    );
    return { batchId, batch, shipment, errors: batch.errors };
  }
}

/** Pairs a finalized shipment with the tariff code of every item description. */
export function buildReportPayload(
  shipment: FinalizedShipment,
  catalog: CatalogService
): ReportPayload {
  const items: ClassifiedItem[] = shipment.invoices.flatMap((invoice) =>
    invoice.items.map((item) => ({
      invoiceNumber: invoice.invoiceNumber,
      partNumber: item.partNumber,
      description: item.description,
      code: catalog.getCode(item.description),
    }))
  );

  return {
    shipment,
    summary: summarizeAllocation(shipment.invoices),
    validation: fieldValidator.validateDocument(toValidationDocument(shipment)),
    items,
    pendingClassifications: items.filter((item) => item.code === PENDING_CLASSIFICATION).length,
  };
}
