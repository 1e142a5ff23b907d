import { ABSENT_VALUE } from '../config/constants';
import { PartyHint, PartyInfo } from '../types/shipment.types';
import { safeString } from '../utils/text.utils';

/**
 * Merges exporter/consignee fragments from the bill of lading and an invoice.
 *
 * - name and phone: invoice first, then bill of lading
 * - address: the longer of the two; a tie keeps the bill of lading's
 * Anything missing falls back to the absent sentinel.
 */
export function reconcileParty(
  shipmentSourced: PartyHint | null | undefined,
  invoiceSourced: PartyHint | null | undefined
): PartyInfo {
  const fromShipment = shipmentSourced ?? {};
  const fromInvoice = invoiceSourced ?? {};

  const shipmentAddress = safeString(fromShipment.address);
  const invoiceAddress = safeString(fromInvoice.address);

  return {
    name: safeString(fromInvoice.name) || safeString(fromShipment.name) || ABSENT_VALUE,
    address:
      invoiceAddress.length > shipmentAddress.length
        ? invoiceAddress
        : shipmentAddress || ABSENT_VALUE,
    phone: safeString(fromInvoice.phone) || safeString(fromShipment.phone) || ABSENT_VALUE,
  };
}
