/**
 * Field-level validation and normalisation of consolidated shipment data.
 * Validation never blocks allocation or reporting; it only scores completeness.
 */

import { ABSENT_VALUE, INCOTERMS } from '../config/constants';
import { FIELD_BY_NAME, FIELD_CATALOGUE } from '../config/fields';
import {
  DocumentValidationResult,
  FieldDescriptor,
  FieldType,
  FieldValidationResult,
  ValidationDocument,
  ValidationFailure,
  ValidationReport,
  ValidationSummary,
} from '../types/validation.types';
import { parseLooseNumber } from '../utils/number.utils';
import { isAbsentValue } from '../utils/text.utils';

const TYPE_ERROR_MESSAGES: Partial<Record<FieldType, string>> = {
  [FieldType.INTEGER]: 'Must be a whole number',
  [FieldType.DECIMAL]: 'Must be a decimal number',
  [FieldType.CURRENCY]: 'Must be a valid monetary value',
};

const KNOWN_INCOTERMS: ReadonlySet<string> = new Set(INCOTERMS);

const AUTO_FIX_CURRENCY_FIELDS = ['freightCost', 'invoiceValue', 'fobValue', 'cifValue'];

function toText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : String(value).trim();
}

export class FieldValidator {
  constructor(private readonly catalogue: readonly FieldDescriptor[] = FIELD_CATALOGUE) {}

  private getDescriptor(name: string): FieldDescriptor | undefined {
    if (this.catalogue === FIELD_CATALOGUE) return FIELD_BY_NAME.get(name);
    return this.catalogue.find((field) => field.name === name);
  }

  private validateText(field: FieldDescriptor, text: string): FieldValidationResult {
    const messages: string[] = [];
    const { minLength, pattern } = field.constraints;

    if (minLength !== undefined && text.length < minLength) {
      messages.push(`Minimum ${minLength} characters`);
    }
    if (pattern && !pattern.test(text)) {
      messages.push(`Invalid format: ${field.description}`);
    }

    return { valid: messages.length === 0, value: text, messages };
  }

  private validateNumber(field: FieldDescriptor, text: string): FieldValidationResult {
    const parsed = parseLooseNumber(text);
    const typeError = TYPE_ERROR_MESSAGES[field.type] ?? 'Must be a number';

    // Malformed input keeps the raw text so it can be told apart from "absent"
    if (parsed === null || (field.type === FieldType.INTEGER && !Number.isInteger(parsed))) {
      return { valid: false, value: text, messages: [typeError] };
    }

    const { minValue } = field.constraints;
    if (minValue !== undefined && parsed < minValue) {
      return { valid: false, value: parsed, messages: [`Minimum value: ${minValue}`] };
    }

    return { valid: true, value: parsed, messages: [] };
  }

  private validateSelect(field: FieldDescriptor, text: string): FieldValidationResult {
    const options = field.constraints.options ?? [];
    if (!options.includes(text)) {
      return {
        valid: false,
        value: text,
        messages: [`Choose one of: ${options.join(', ')}`],
      };
    }
    return { valid: true, value: text, messages: [] };
  }

  validateField(name: string, rawValue: unknown): FieldValidationResult {
    const field = this.getDescriptor(name);
    if (!field) {
      const passthrough = typeof rawValue === 'number' ? rawValue : toText(rawValue ?? '');
      return { valid: true, value: passthrough, messages: [] };
    }

    if (isAbsentValue(rawValue)) {
      return field.required
        ? { valid: false, value: ABSENT_VALUE, messages: [`Required field: ${field.label}`] }
        : { valid: true, value: ABSENT_VALUE, messages: [] };
    }

    const text = toText(rawValue);

    switch (field.type) {
      case FieldType.TEXT:
        return this.validateText(field, text);
      case FieldType.INTEGER:
      case FieldType.DECIMAL:
      case FieldType.CURRENCY:
        return this.validateNumber(field, text);
      case FieldType.SELECT:
        return this.validateSelect(field, text);
    }
  }

  validateDocument(document: ValidationDocument): DocumentValidationResult {
    const fields: Record<string, FieldValidationResult> = {};

    for (const field of this.catalogue) {
      fields[field.name] = this.validateField(field.name, document[field.name] ?? ABSENT_VALUE);
    }

    const summary = this.summarize(fields);
    const completionRate =
      summary.totalFields > 0 ? (summary.validFields / summary.totalFields) * 100 : 100;

    return {
      valid: summary.invalidFields === 0,
      fields,
      completionRate,
      summary,
    };
  }

  private summarize(fields: Record<string, FieldValidationResult>): ValidationSummary {
    const failures: ValidationFailure[] = [];
    const errorMessages: string[] = [];
    let validFields = 0;

    for (const field of this.catalogue) {
      const result = fields[field.name];
      if (result.valid) {
        validFields++;
        continue;
      }
      failures.push({ field: field.name, label: field.label, messages: result.messages });
      for (const message of result.messages) {
        errorMessages.push(`${field.label}: ${message}`);
      }
    }

    return {
      totalFields: this.catalogue.length,
      validFields,
      invalidFields: this.catalogue.length - validFields,
      errorMessages,
      failures,
    };
  }

  /**
   * Aggregate view over many documents: how often each field was detected
   * and valid, and which messages repeat most.
   */
  getValidationReport(documents: ValidationDocument[]): ValidationReport {
    const fieldCompleteness: ValidationReport['fieldCompleteness'] = {};
    const errorCounts = new Map<string, number>();
    let validDocuments = 0;

    for (const document of documents) {
      const validation = this.validateDocument(document);
      if (validation.valid) validDocuments++;

      for (const [name, result] of Object.entries(validation.fields)) {
        const entry = fieldCompleteness[name] ?? { total: 0, valid: 0, detected: 0 };
        entry.total++;
        if (result.valid) entry.valid++;
        if (result.value !== ABSENT_VALUE) entry.detected++;
        fieldCompleteness[name] = entry;
      }

      for (const message of validation.summary.errorMessages) {
        errorCounts.set(message, (errorCounts.get(message) ?? 0) + 1);
      }
    }

    const commonErrors = Array.from(errorCounts, ([message, count]) => ({ message, count })).sort(
      (a, b) => b.count - a.count
    );

    return {
      totalDocuments: documents.length,
      validDocuments,
      documentValidityRate: documents.length > 0 ? (validDocuments / documents.length) * 100 : 0,
      fieldCompleteness,
      commonErrors,
      generatedAt: new Date().toISOString(),
    };
  }

  /** Fixes the usual OCR slips without touching absent fields. */
  applyAutoFixes(document: ValidationDocument): ValidationDocument {
    const fixed: ValidationDocument = { ...document };

    if (!isAbsentValue(fixed.blNumber)) {
      fixed.blNumber = toText(fixed.blNumber).toUpperCase();
    }

    if (!isAbsentValue(fixed.containerNumber)) {
      const container = toText(fixed.containerNumber).toUpperCase().replace(/[^A-Z0-9]/g, '');
      if (container.length === 11) {
        fixed.containerNumber = container;
      }
    }

    if (!isAbsentValue(fixed.incoterm)) {
      const incoterm = toText(fixed.incoterm).toUpperCase();
      if (KNOWN_INCOTERMS.has(incoterm)) {
        fixed.incoterm = incoterm;
      }
    }

    for (const name of AUTO_FIX_CURRENCY_FIELDS) {
      if (isAbsentValue(fixed[name])) continue;
      const parsed = parseLooseNumber(fixed[name]);
      if (parsed !== null && parsed > 0) {
        fixed[name] = parsed;
      }
    }

    return fixed;
  }
}

export const fieldValidator = new FieldValidator();
