import {
  allocateCosts,
  finalizeShipment,
  recalculateShipment,
  summarizeAllocation,
} from '../services/costAllocation.service';
import { createMockInvoice, createMockItem, createMockShipment } from './helpers/mockDataHelpers';

function createTwoInvoices() {
  return [
    createMockInvoice('INV-A', [
      createMockItem({ description: 'Blouse', quantity: 10, unitPrice: 5, totalPrice: 50 }),
      createMockItem({ description: 'Skirt', quantity: 2, unitPrice: 25, totalPrice: null }),
    ]),
    createMockInvoice('INV-B', [
      createMockItem({ description: 'Shoes', quantity: 1, unitPrice: 100, totalPrice: 100 }),
    ]),
  ];
}

describe('allocateCosts', () => {
  it('should spread freight across invoices by FOB share', () => {
    const invoices = allocateCosts(100, createTwoInvoices());
    const allocations = invoices.flatMap((invoice) => invoice.items.map((item) => item.allocation));

    expect(allocations.map((a) => a.fobValue)).toEqual([50, 50, 100]);
    expect(allocations.map((a) => a.itemProportion)).toEqual([0.25, 0.25, 0.5]);
    expect(allocations.map((a) => a.freightProportional)).toEqual([25, 25, 50]);
    expect(allocations[0].insuranceCalculated).toBeCloseTo(0.75, 10);
    expect(allocations[2].insuranceCalculated).toBeCloseTo(1.5, 10);
    expect(allocations[0].cifValueCorrected).toBeCloseTo(75.75, 10);
    expect(allocations[2].cifValueCorrected).toBeCloseTo(151.5, 10);
  });

  it('should make proportions sum to one and freight sum to the total', () => {
    const invoices = allocateCosts(733.33, createTwoInvoices());
    const summary = summarizeAllocation(invoices);
    const proportionSum = invoices
      .flatMap((invoice) => invoice.items)
      .reduce((sum, item) => sum + item.allocation.itemProportion, 0);

    expect(proportionSum).toBeCloseTo(1, 10);
    expect(summary.totalFreight).toBeCloseTo(733.33, 8);
  });

  it('should use quantity times unit price when the declared total is zero', () => {
    const [invoice] = allocateCosts(10, [
      createMockInvoice('INV-C', [
        createMockItem({ description: 'Belt', quantity: 4, unitPrice: 2.5, totalPrice: 0 }),
      ]),
    ]);

    expect(invoice.items[0].allocation.fobValue).toBe(10);
    expect(invoice.items[0].allocation.itemProportion).toBe(1);
  });

  it('should allocate nothing when every item is worth zero', () => {
    const [invoice] = allocateCosts(500, [
      createMockInvoice('INV-D', [createMockItem({ description: 'Sample', quantity: 3 })]),
    ]);

    expect(invoice.items[0].allocation).toEqual({
      fobValue: 0,
      itemProportion: 0,
      freightProportional: 0,
      insuranceCalculated: 0,
      cifValueCorrected: 0,
    });
  });

  it('should not mutate its input', () => {
    const invoices = createTwoInvoices();
    allocateCosts(100, invoices);
    expect(invoices[0].items[0].allocation).toBeUndefined();
  });

  it('should leave the declared invoice total untouched', () => {
    const invoices = createTwoInvoices();
    invoices[0].totalValue = 999;
    expect(allocateCosts(100, invoices)[0].totalValue).toBe(999);
  });
});

describe('recalculateShipment', () => {
  it('should recompute from edited quantities', () => {
    const shipment = finalizeShipment(createMockShipment(100, createTwoInvoices()));
    shipment.invoices[1].items[0].totalPrice = null;
    shipment.invoices[1].items[0].quantity = 3;

    const recalculated = recalculateShipment(shipment);
    const fobValues = recalculated.invoices.flatMap((invoice) =>
      invoice.items.map((item) => item.allocation.fobValue)
    );

    expect(fobValues).toEqual([50, 50, 300]);
    expect(recalculated.invoices[1].items[0].allocation.freightProportional).toBeCloseTo(75, 10);
  });

  it('should apply an edited freight cost', () => {
    const shipment = createMockShipment(100, createTwoInvoices());
    const recalculated = recalculateShipment(shipment, { freightCost: 200 });

    expect(recalculated.billOfLading.freightCost).toBe(200);
    expect(recalculated.invoices[1].items[0].allocation.freightProportional).toBe(100);
  });

  it('should return identical results when run twice', () => {
    const once = finalizeShipment(createMockShipment(100, createTwoInvoices()));
    const twice = recalculateShipment(once);
    expect(twice).toEqual(once);
  });
});

describe('summarizeAllocation', () => {
  it('should total every allocated value', () => {
    const summary = summarizeAllocation(allocateCosts(100, createTwoInvoices()));

    expect(summary.itemCount).toBe(3);
    expect(summary.totalFob).toBe(200);
    expect(summary.totalFreight).toBe(100);
    expect(summary.totalInsurance).toBeCloseTo(3, 10);
    expect(summary.totalCif).toBeCloseTo(303, 10);
  });
});
