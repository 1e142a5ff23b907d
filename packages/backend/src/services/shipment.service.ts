/**
 * Builds one consolidated shipment (bill of lading + invoices) out of raw
 * extraction payloads, and flattens it back into the field catalogue for
 * validation and session snapshots.
 */

import { ABSENT_VALUE, INSURANCE_RATE, TRANSLATION_ERROR_PREFIX } from '../config/constants';
import { ExtractedPayload } from '../types/batch.types';
import { Translator } from '../types/extraction.types';
import {
  BillOfLadingRecord,
  FinalizedShipment,
  InvoiceRecord,
  LineItem,
  PartyHint,
  ShipmentRecord,
  ShipmentSnapshot,
} from '../types/shipment.types';
import { ValidationDocument } from '../types/validation.types';
import { InvalidInputError, getErrorMessage } from '../utils/errors';
import { isPlainObject } from '../utils/json.utils';
import { parseLooseNumber, safeNumber } from '../utils/number.utils';
import { isAbsentValue, safeString } from '../utils/text.utils';
import { finalizeShipment } from './costAllocation.service';
import { reconcileParty } from './partyReconciler.service';

function toPartyHint(value: unknown): PartyHint {
  if (!isPlainObject(value)) return {};
  return {
    name: safeString(value.name) || null,
    address: safeString(value.address) || null,
    phone: safeString(value.phone) || null,
  };
}

function toLineItem(value: unknown): LineItem | null {
  if (!isPlainObject(value)) return null;
  const description = safeString(value.description);
  return {
    partNumber: safeString(value.part_number ?? value.partNumber),
    description,
    descriptionOriginal: description,
    quantity: safeNumber(value.quantity),
    unitPrice: safeNumber(value.unit_price ?? value.unitPrice),
    totalPrice: parseLooseNumber(value.total_price ?? value.totalPrice),
  };
}

/** Absent or unreadable values stay null so validation reports them as not detected. */
function optionalNumber(value: unknown): number | null {
  if (isAbsentValue(value)) return null;
  return parseLooseNumber(value);
}

export function normalizeBillOfLading(payload: ExtractedPayload): BillOfLadingRecord {
  const exporter = toPartyHint(payload.exporter);
  const consignee = toPartyHint(payload.consignee);

  return {
    blNumber: safeString(payload.bl_number),
    bookingNumber: safeString(payload.booking_number),
    containerNumber: safeString(payload.container_no),
    vesselVoyage: safeString(payload.vessel_voyage),
    portOfLoading: safeString(payload.port_of_loading),
    portOfDischarge: safeString(payload.port_of_discharge),
    placeOfDelivery: safeString(payload.place_of_delivery),
    dateLadenOnBoard: safeString(payload.date_laden_on_board),
    cargoType: safeString(payload.cargo_type),
    freightCost: optionalNumber(payload.freight_cost),
    packagesCount: optionalNumber(payload.packages_count),
    grossWeight: optionalNumber(payload.gross_weight),
    grossMeasurement: optionalNumber(payload.gross_measurement),
    exporter,
    consignee,
    exporterDetails: reconcileParty(exporter, null),
    consigneeDetails: reconcileParty(consignee, null),
  };
}

export function normalizeInvoice(payload: ExtractedPayload): InvoiceRecord {
  const rawItems = Array.isArray(payload.items) ? payload.items : [];
  const items: LineItem[] = [];
  for (const rawItem of rawItems) {
    const item = toLineItem(rawItem);
    if (item) items.push(item);
  }

  return {
    invoiceNumber: safeString(payload.invoice_number),
    invoiceDate: safeString(payload.invoice_date),
    currency: safeString(payload.currency).toUpperCase(),
    incoterm: safeString(payload.incoterm).toUpperCase(),
    totalValue: safeNumber(payload.total_value),
    shippingCostInvoice: safeNumber(payload.shipping_cost_invoice),
    exporter: toPartyHint(payload.exporter),
    consignee: toPartyHint(payload.consignee),
    items,
  };
}

async function translateDescription(translator: Translator, text: string): Promise<string | null> {
  if (isAbsentValue(text)) return null;
  try {
    const translated = (await translator.translate(text)).trim();
    if (!translated || translated.startsWith(TRANSLATION_ERROR_PREFIX)) return null;
    return translated;
  } catch (error) {
    console.warn(`[Shipment] Translation failed, keeping original text: ${getErrorMessage(error)}`);
    return null;
  }
}

/**
 * Replaces each item description with its translation, keeping the source
 * text in `descriptionOriginal`. A failed translation leaves the item as is.
 */
export async function translateItems(
  invoices: InvoiceRecord[],
  translator: Translator
): Promise<InvoiceRecord[]> {
  const translatedInvoices: InvoiceRecord[] = [];

  for (const invoice of invoices) {
    const items: LineItem[] = [];
    for (const item of invoice.items) {
      const translated = await translateDescription(translator, item.descriptionOriginal);
      items.push(
        translated
          ? { ...item, description: translated, descriptionTranslated: translated }
          : { ...item, description: item.descriptionOriginal }
      );
    }
    translatedInvoices.push({ ...invoice, items });
  }

  return translatedInvoices;
}

export interface ConsolidateOptions {
  translator?: Translator | null;
}

export async function consolidateShipment(
  billOfLadingPayload: ExtractedPayload,
  invoicePayloads: ExtractedPayload[],
  options: ConsolidateOptions = {}
): Promise<FinalizedShipment> {
  const billOfLading = normalizeBillOfLading(billOfLadingPayload);

  let invoices: InvoiceRecord[] = invoicePayloads.map(normalizeInvoice).map((invoice) => ({
    ...invoice,
    exporterDetails: reconcileParty(billOfLading.exporter, invoice.exporter),
    consigneeDetails: reconcileParty(billOfLading.consignee, invoice.consignee),
  }));

  if (options.translator) {
    invoices = await translateItems(invoices, options.translator);
  }

  const shipment: ShipmentRecord = {
    billOfLading: {
      ...billOfLading,
      exporterDetails: reconcileParty(billOfLading.exporter, invoices[0]?.exporter),
      consigneeDetails: reconcileParty(billOfLading.consignee, invoices[0]?.consignee),
    },
    invoices,
  };

  const finalized = finalizeShipment(shipment);
  console.log(
    `[Shipment] Consolidated B/L ${billOfLading.blNumber || ABSENT_VALUE} with ${invoices.length} invoice(s)`
  );
  return finalized;
}

/**
 * Flat view of B/L + first invoice keyed by the field catalogue. FOB and
 * CIF are derived from the incoterm when only one of them is declared.
 */
export function toValidationDocument(shipment: ShipmentRecord): ValidationDocument {
  const { billOfLading } = shipment;
  const document: ValidationDocument = {
    blNumber: billOfLading.blNumber,
    freightCost: billOfLading.freightCost,
    packagesCount: billOfLading.packagesCount,
    grossWeight: billOfLading.grossWeight,
    containerNumber: billOfLading.containerNumber,
    exporter: billOfLading.exporterDetails.name,
    consignee: billOfLading.consigneeDetails.name,
  };

  const firstInvoice = shipment.invoices[0];
  if (!firstInvoice) return document;

  const freight = billOfLading.freightCost ?? 0;
  document.incoterm = firstInvoice.incoterm;
  document.invoiceValue = firstInvoice.totalValue;
  document.currency = firstInvoice.currency;

  if (firstInvoice.incoterm === 'FOB') {
    const fob = firstInvoice.totalValue;
    document.fobValue = fob;
    document.cifValue = fob + freight + fob * INSURANCE_RATE;
  } else if (firstInvoice.incoterm === 'CIF') {
    const cif = firstInvoice.totalValue;
    document.cifValue = cif;
    document.fobValue = cif / (1 + INSURANCE_RATE) - freight;
  }

  return document;
}

export function createSnapshot(sessionId: string, shipment: ShipmentRecord): ShipmentSnapshot {
  if (!sessionId.trim()) {
    throw new InvalidInputError('Session id is required');
  }
  return {
    version: 1,
    sessionId,
    savedAt: new Date().toISOString(),
    shipment: structuredClone(shipment),
  };
}

function isLineItem(value: unknown): boolean {
  return (
    isPlainObject(value) &&
    typeof value.description === 'string' &&
    typeof value.quantity === 'number' &&
    typeof value.unitPrice === 'number' &&
    (value.totalPrice === null || typeof value.totalPrice === 'number')
  );
}

function isInvoiceRecord(value: unknown): boolean {
  if (!isPlainObject(value)) return false;
  const items: unknown = value.items;
  return (
    typeof value.invoiceNumber === 'string' &&
    typeof value.totalValue === 'number' &&
    Array.isArray(items) &&
    items.every(isLineItem)
  );
}

function isShipmentRecord(value: unknown): value is ShipmentRecord {
  if (!isPlainObject(value)) return false;
  const billOfLading: unknown = value.billOfLading;
  const invoices: unknown = value.invoices;

  if (!isPlainObject(billOfLading) || !Array.isArray(invoices)) return false;

  return (
    typeof billOfLading.blNumber === 'string' &&
    (billOfLading.freightCost === null || typeof billOfLading.freightCost === 'number') &&
    isPlainObject(billOfLading.exporterDetails) &&
    isPlainObject(billOfLading.consigneeDetails) &&
    invoices.every(isInvoiceRecord)
  );
}

/** Accepts a snapshot as stored (object or JSON text); throws InvalidInputError on a bad shape. */
export function restoreSnapshot(raw: unknown): ShipmentSnapshot {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new InvalidInputError(`Snapshot is not valid JSON: ${getErrorMessage(error)}`);
    }
  }

  if (!isPlainObject(value) || value.version !== 1) {
    throw new InvalidInputError('Unsupported snapshot version');
  }

  const { sessionId, savedAt, shipment } = value;
  if (typeof sessionId !== 'string' || typeof savedAt !== 'string') {
    throw new InvalidInputError('Snapshot is missing its session id or timestamp');
  }
  if (!isShipmentRecord(shipment)) {
    throw new InvalidInputError('Snapshot does not contain a valid shipment');
  }

  return { version: 1, sessionId, savedAt, shipment };
}
