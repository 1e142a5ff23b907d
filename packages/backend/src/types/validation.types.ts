export enum FieldType {
  TEXT = 'text',
  INTEGER = 'integer',
  DECIMAL = 'decimal',
  CURRENCY = 'currency',
  SELECT = 'select',
}

export interface FieldConstraints {
  minLength?: number;
  minValue?: number;
  pattern?: RegExp;
  options?: readonly string[];
}

export interface FieldDescriptor {
  name: string;
  label: string;
  type: FieldType;
  required: boolean;
  description: string;
  constraints: FieldConstraints;
}

export type NormalizedValue = string | number;

export interface FieldValidationResult {
  valid: boolean;
  /** Parsed value, the absent sentinel, or the raw text when it could not be parsed */
  value: NormalizedValue;
  messages: string[];
}

export interface ValidationFailure {
  field: string;
  label: string;
  messages: string[];
}

export interface ValidationSummary {
  totalFields: number;
  validFields: number;
  invalidFields: number;
  errorMessages: string[];
  failures: ValidationFailure[];
}

export interface DocumentValidationResult {
  valid: boolean;
  fields: Record<string, FieldValidationResult>;
  completionRate: number;
  summary: ValidationSummary;
}

export interface FieldCompleteness {
  total: number;
  valid: number;
  detected: number;
}

export interface ValidationReport {
  totalDocuments: number;
  validDocuments: number;
  documentValidityRate: number;
  fieldCompleteness: Record<string, FieldCompleteness>;
  commonErrors: Array<{ message: string; count: number }>;
  generatedAt: string;
}

export type ValidationDocument = Record<string, unknown>;
