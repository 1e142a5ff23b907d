import { CURRENCIES, INCOTERMS } from './constants';
import { FieldDescriptor, FieldType } from '../types/validation.types';

/**
 * Fields checked on every consolidated shipment, in display order.
 * Keys match the flat document produced by `toValidationDocument`.
 */
export const FIELD_CATALOGUE: readonly FieldDescriptor[] = [
  {
    name: 'blNumber',
    label: 'B/L number',
    type: FieldType.TEXT,
    required: true,
    description: 'Upper-case letters, digits and hyphens',
    constraints: { pattern: /^[A-Z0-9-]+$/ },
  },
  {
    name: 'exporter',
    label: 'Exporter',
    type: FieldType.TEXT,
    required: true,
    description: 'Full exporter name',
    constraints: { minLength: 2 },
  },
  {
    name: 'consignee',
    label: 'Consignee',
    type: FieldType.TEXT,
    required: true,
    description: 'Full consignee name',
    constraints: { minLength: 2 },
  },
  {
    name: 'freightCost',
    label: 'Freight cost',
    type: FieldType.CURRENCY,
    required: false,
    description: 'Numeric freight value',
    constraints: { minValue: 0 },
  },
  {
    name: 'packagesCount',
    label: 'Packages',
    type: FieldType.INTEGER,
    required: false,
    description: 'Number of packages',
    constraints: { minValue: 1 },
  },
  {
    name: 'grossWeight',
    label: 'Gross weight',
    type: FieldType.DECIMAL,
    required: false,
    description: 'Weight in kilograms',
    constraints: { minValue: 0.1 },
  },
  {
    name: 'containerNumber',
    label: 'Container number',
    type: FieldType.TEXT,
    required: false,
    description: '4 letters followed by 7 digits (e.g. ABCD1234567)',
    constraints: { pattern: /^[A-Z]{4}[0-9]{7}$/ },
  },
  {
    name: 'incoterm',
    label: 'Incoterm',
    type: FieldType.SELECT,
    required: true,
    description: 'International commercial term',
    constraints: { options: INCOTERMS },
  },
  {
    name: 'invoiceValue',
    label: 'Invoice value',
    type: FieldType.CURRENCY,
    required: false,
    description: 'Declared invoice total',
    constraints: { minValue: 0 },
  },
  {
    name: 'fobValue',
    label: 'FOB value',
    type: FieldType.CURRENCY,
    required: false,
    description: 'Free On Board value',
    constraints: { minValue: 0 },
  },
  {
    name: 'cifValue',
    label: 'CIF value',
    type: FieldType.CURRENCY,
    required: false,
    description: 'Cost, Insurance and Freight value',
    constraints: { minValue: 0 },
  },
  {
    name: 'currency',
    label: 'Currency',
    type: FieldType.SELECT,
    required: false,
    description: 'Currency of the declared values',
    constraints: { options: CURRENCIES },
  },
];

export const FIELD_BY_NAME: ReadonlyMap<string, FieldDescriptor> = new Map(
  FIELD_CATALOGUE.map((field) => [field.name, field])
);
