/**
 * Freight proration and CIF derivation.
 *
 * One shipment-level freight cost is spread over every line item of every
 * invoice in proportion to the item's FOB value; insurance is a flat 1.5%
 * of FOB. Results are recomputed from quantity / unit price / total price
 * on every call, never from earlier allocations.
 */

import { INSURANCE_RATE } from '../config/constants';
import {
  AllocatedInvoice,
  AllocatedLineItem,
  AllocationSummary,
  FinalizedShipment,
  InvoiceRecord,
  LineItem,
  LineItemAllocation,
  ShipmentRecord,
} from '../types/shipment.types';

function itemFob(item: LineItem): number {
  if (item.totalPrice !== null && item.totalPrice > 0) {
    return item.totalPrice;
  }
  return item.quantity * item.unitPrice;
}

function extendedPrice(item: LineItem): number {
  return item.quantity * item.unitPrice;
}

function sumItems(invoices: InvoiceRecord[], valueOf: (item: LineItem) => number): number {
  let total = 0;
  for (const invoice of invoices) {
    for (const item of invoice.items) {
      total += valueOf(item);
    }
  }
  return total;
}

export function allocateCosts(freightCost: number, invoices: InvoiceRecord[]): AllocatedInvoice[] {
  let totalFobShipment = sumItems(invoices, itemFob);
  if (totalFobShipment === 0) {
    totalFobShipment = sumItems(invoices, extendedPrice);
  }

  return invoices.map((invoice) => ({
    ...invoice,
    items: invoice.items.map((item): AllocatedLineItem => {
      const fobValue = itemFob(item);
      const itemProportion = totalFobShipment > 0 ? fobValue / totalFobShipment : 0;
      const freightProportional = freightCost * itemProportion;
      const insuranceCalculated = fobValue * INSURANCE_RATE;

      const allocation: LineItemAllocation = {
        fobValue,
        itemProportion,
        freightProportional,
        insuranceCalculated,
        cifValueCorrected: fobValue + freightProportional + insuranceCalculated,
      };

      return { ...item, allocation };
    }),
  }));
}

/**
 * Re-runs the allocation after the user edited the shipment. `freightCost`
 * overrides the bill of lading's value when the user changed it.
 */
export function recalculateShipment(
  shipment: ShipmentRecord,
  edits: { freightCost?: number } = {}
): FinalizedShipment {
  const freightCost = edits.freightCost ?? shipment.billOfLading.freightCost;

  return {
    billOfLading: { ...shipment.billOfLading, freightCost },
    // A B/L without a freight cost allocates nothing
    invoices: allocateCosts(freightCost ?? 0, shipment.invoices),
  };
}

/** Allocation with a type that guarantees every item carries its derived values. */
export function finalizeShipment(shipment: ShipmentRecord): FinalizedShipment {
  return recalculateShipment(shipment);
}

export function summarizeAllocation(invoices: AllocatedInvoice[]): AllocationSummary {
  const summary: AllocationSummary = {
    itemCount: 0,
    totalFob: 0,
    totalFreight: 0,
    totalInsurance: 0,
    totalCif: 0,
  };

  for (const invoice of invoices) {
    for (const { allocation } of invoice.items) {
      summary.itemCount++;
      summary.totalFob += allocation.fobValue;
      summary.totalFreight += allocation.freightProportional;
      summary.totalInsurance += allocation.insuranceCalculated;
      summary.totalCif += allocation.cifValueCorrected;
    }
  }

  return summary;
}
