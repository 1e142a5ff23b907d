export interface PartyInfo {
  name: string;
  address: string;
  phone: string;
}

/** Identity fragment as extracted from one document; any part may be missing. */
export interface PartyHint {
  name?: string | null;
  address?: string | null;
  phone?: string | null;
}

/** Values written by the cost allocation engine, always as one unit. */
export interface LineItemAllocation {
  fobValue: number;
  itemProportion: number;
  freightProportional: number;
  insuranceCalculated: number;
  cifValueCorrected: number;
}

export interface LineItem {
  partNumber: string;
  description: string;
  descriptionOriginal: string;
  descriptionTranslated?: string;
  quantity: number;
  unitPrice: number;
  /** Declared line total; null when the document does not show one */
  totalPrice: number | null;
  allocation?: LineItemAllocation;
}

export interface AllocatedLineItem extends LineItem {
  allocation: LineItemAllocation;
}

export interface InvoiceRecord<TItem extends LineItem = LineItem> {
  invoiceNumber: string;
  invoiceDate: string;
  currency: string;
  incoterm: string;
  /** Declared by the document or the user; never forced to match the item sum */
  totalValue: number;
  shippingCostInvoice: number;
  exporter: PartyHint;
  /** Buyer block, when the invoice shows one */
  consignee?: PartyHint;
  exporterDetails?: PartyInfo;
  consigneeDetails?: PartyInfo;
  items: TItem[];
}

export type AllocatedInvoice = InvoiceRecord<AllocatedLineItem>;

export interface BillOfLadingRecord {
  blNumber: string;
  bookingNumber: string;
  containerNumber: string;
  vesselVoyage: string;
  portOfLoading: string;
  portOfDischarge: string;
  placeOfDelivery: string;
  dateLadenOnBoard: string;
  cargoType: string;
  /** null when the document does not show a value */
  freightCost: number | null;
  packagesCount: number | null;
  grossWeight: number | null;
  grossMeasurement: number | null;
  exporter: PartyHint;
  consignee: PartyHint;
  exporterDetails: PartyInfo;
  consigneeDetails: PartyInfo;
}

export interface ShipmentRecord<TItem extends LineItem = LineItem> {
  billOfLading: BillOfLadingRecord;
  invoices: InvoiceRecord<TItem>[];
}

/** Shipment whose every item carries its allocation; the shape report generators accept. */
export type FinalizedShipment = ShipmentRecord<AllocatedLineItem>;

export interface AllocationSummary {
  itemCount: number;
  totalFob: number;
  totalFreight: number;
  totalInsurance: number;
  totalCif: number;
}

export interface ShipmentSnapshot {
  version: 1;
  sessionId: string;
  savedAt: string;
  shipment: ShipmentRecord;
}
