import { FieldValidator, fieldValidator } from '../services/fieldValidator.service';
import { FieldType, ValidationDocument } from '../types/validation.types';

function createValidDocument(overrides: ValidationDocument = {}): ValidationDocument {
  return {
    blNumber: 'MAEU240001',
    exporter: 'Harbor Textiles Co',
    consignee: 'Andes Retail SAS',
    freightCost: '1,000.00',
    packagesCount: 120,
    grossWeight: '2.450,5',
    containerNumber: 'MSKU1234567',
    incoterm: 'FOB',
    invoiceValue: 3000,
    fobValue: 3000,
    cifValue: 4045,
    currency: 'USD',
    ...overrides,
  };
}

describe('FieldValidator', () => {
  describe('validateField', () => {
    it('should accept a well-formed B/L number', () => {
      expect(fieldValidator.validateField('blNumber', ' MAEU-240001 ')).toEqual({
        valid: true,
        value: 'MAEU-240001',
        messages: [],
      });
    });

    it('should reject a lower-case B/L number', () => {
      expect(fieldValidator.validateField('blNumber', 'maeu240001')).toEqual({
        valid: false,
        value: 'maeu240001',
        messages: ['Invalid format: Upper-case letters, digits and hyphens'],
      });
    });

    it('should flag missing required fields and normalise them to the sentinel', () => {
      expect(fieldValidator.validateField('blNumber', 'not detected')).toEqual({
        valid: false,
        value: 'not detected',
        messages: ['Required field: B/L number'],
      });
    });

    it('should let optional fields be absent', () => {
      expect(fieldValidator.validateField('containerNumber', null)).toEqual({
        valid: true,
        value: 'not detected',
        messages: [],
      });
    });

    it('should enforce minimum text length', () => {
      expect(fieldValidator.validateField('exporter', 'A').messages).toEqual(['Minimum 2 characters']);
    });

    it('should check the container number pattern', () => {
      expect(fieldValidator.validateField('containerNumber', 'MSK1234567').messages).toEqual([
        'Invalid format: 4 letters followed by 7 digits (e.g. ABCD1234567)',
      ]);
    });

    it('should parse integers and reject fractions', () => {
      expect(fieldValidator.validateField('packagesCount', '12')).toEqual({
        valid: true,
        value: 12,
        messages: [],
      });
      expect(fieldValidator.validateField('packagesCount', '12.5')).toEqual({
        valid: false,
        value: '12.5',
        messages: ['Must be a whole number'],
      });
    });

    it('should apply minimum values', () => {
      expect(fieldValidator.validateField('packagesCount', 0)).toEqual({
        valid: false,
        value: 0,
        messages: ['Minimum value: 1'],
      });
      expect(fieldValidator.validateField('grossWeight', '0.05').messages).toEqual([
        'Minimum value: 0.1',
      ]);
    });

    it('should parse locale-formatted amounts', () => {
      expect(fieldValidator.validateField('freightCost', 'USD 1,250.00').value).toBe(1250);
      expect(fieldValidator.validateField('grossWeight', '1.234,5').value).toBe(1234.5);
    });

    it('should keep the raw text of a malformed amount', () => {
      expect(fieldValidator.validateField('freightCost', 'abc')).toEqual({
        valid: false,
        value: 'abc',
        messages: ['Must be a valid monetary value'],
      });
    });

    it('should restrict select fields to their options', () => {
      expect(fieldValidator.validateField('incoterm', 'CIF').valid).toBe(true);
      expect(fieldValidator.validateField('incoterm', 'fob').messages).toEqual([
        'Choose one of: FOB, CIF, EXW, CFR, DAP, DDP',
      ]);
      expect(fieldValidator.validateField('currency', 'GBP').messages).toEqual([
        'Choose one of: USD, EUR, COP, PEN, MXN, CLP, ARS',
      ]);
    });

    it('should pass unknown fields through unchanged', () => {
      expect(fieldValidator.validateField('notes', ' handle with care ')).toEqual({
        valid: true,
        value: 'handle with care',
        messages: [],
      });
    });
  });

  describe('validateDocument', () => {
    it('should report a complete document as valid', () => {
      const result = fieldValidator.validateDocument(createValidDocument());

      expect(result.valid).toBe(true);
      expect(result.completionRate).toBe(100);
      expect(result.summary.totalFields).toBe(12);
      expect(result.fields.freightCost.value).toBe(1000);
      expect(result.fields.grossWeight.value).toBe(2450.5);
    });

    it('should summarise failures in catalogue order', () => {
      const document = createValidDocument({ packagesCount: 0 });
      delete document.blNumber;

      const result = fieldValidator.validateDocument(document);

      expect(result.valid).toBe(false);
      expect(result.summary.validFields).toBe(10);
      expect(result.summary.invalidFields).toBe(2);
      expect(result.completionRate).toBeCloseTo((10 / 12) * 100, 5);
      expect(result.summary.errorMessages).toEqual([
        'B/L number: Required field: B/L number',
        'Packages: Minimum value: 1',
      ]);
      expect(result.summary.failures.map((failure) => failure.field)).toEqual([
        'blNumber',
        'packagesCount',
      ]);
    });

    it('should use a custom catalogue when given one', () => {
      const validator = new FieldValidator([
        {
          name: 'reference',
          label: 'Reference',
          type: FieldType.TEXT,
          required: true,
          description: 'Customer reference',
          constraints: {},
        },
      ]);

      expect(validator.validateDocument({}).summary.errorMessages).toEqual([
        'Reference: Required field: Reference',
      ]);
    });
  });

  describe('getValidationReport', () => {
    it('should aggregate completeness and common errors', () => {
      const missingBl = createValidDocument();
      delete missingBl.blNumber;

      const report = fieldValidator.getValidationReport([createValidDocument(), missingBl]);

      expect(report.totalDocuments).toBe(2);
      expect(report.validDocuments).toBe(1);
      expect(report.documentValidityRate).toBe(50);
      expect(report.fieldCompleteness.blNumber).toEqual({ total: 2, valid: 1, detected: 1 });
      expect(report.fieldCompleteness.currency).toEqual({ total: 2, valid: 2, detected: 2 });
      expect(report.commonErrors).toEqual([
        { message: 'B/L number: Required field: B/L number', count: 1 },
      ]);
    });

    it('should handle an empty list', () => {
      const report = fieldValidator.getValidationReport([]);
      expect(report.documentValidityRate).toBe(0);
      expect(report.commonErrors).toEqual([]);
    });
  });

  describe('applyAutoFixes', () => {
    it('should fix casing, container spacing and amounts', () => {
      const fixed = fieldValidator.applyAutoFixes({
        blNumber: 'maeu123',
        containerNumber: 'msku 123456-7',
        incoterm: 'cif',
        freightCost: '$1,500.00',
        fobValue: 'not detected',
      });

      expect(fixed).toEqual({
        blNumber: 'MAEU123',
        containerNumber: 'MSKU1234567',
        incoterm: 'CIF',
        freightCost: 1500,
        fobValue: 'not detected',
      });
    });

    it('should leave unknown incoterms and short container numbers alone', () => {
      const fixed = fieldValidator.applyAutoFixes({ incoterm: 'fca', containerNumber: 'ab12' });
      expect(fixed).toEqual({ incoterm: 'fca', containerNumber: 'ab12' });
    });
  });
});
