// Diagnostic collection plus the field-level helpers every structural walker shares.
// Helpers narrow untrusted input and record a diagnostic on mismatch; they never throw.

import { Diagnostic, DiagnosticCategory, DiagnosticCode, Severity } from './types';
import { GrammarResult } from './grammar';
import { fieldPath, indexPath, describeValue } from './format';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasField(record: JsonRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key) && record[key] !== undefined;
}

export class DiagnosticSink {
  private readonly items: Diagnostic[] = [];

  constructor(private readonly category: DiagnosticCategory) {}

  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }

  report(severity: Severity, code: DiagnosticCode, path: string, message: string): void {
    this.items.push({ severity, category: this.category, code, path, message });
  }

  error(code: DiagnosticCode, path: string, message: string): void {
    this.report('error', code, path, message);
  }

  warning(code: DiagnosticCode, path: string, message: string): void {
    this.report('warning', code, path, message);
  }

  // Record a grammar failure; returns whether the value passed.
  grammar(result: GrammarResult, path: string, code: DiagnosticCode = 'INVALID_FORMAT'): boolean {
    if (result.valid) return true;
    this.error(code, path, result.reason);
    return false;
  }

  requireString(record: JsonRecord, key: string, base: string, context?: string): string | undefined {
    const path = fieldPath(base, key);
    if (!hasField(record, key)) {
      this.error('MISSING_FIELD', path, `missing required field '${key}'${context ? ` (${context})` : ''}`);
      return undefined;
    }
    return this.asString(record[key], path);
  }

  optionalString(record: JsonRecord, key: string, base: string): string | undefined {
    if (!hasField(record, key)) return undefined;
    return this.asString(record[key], fieldPath(base, key));
  }

  optionalRecord(record: JsonRecord, key: string, base: string): JsonRecord | undefined {
    if (!hasField(record, key)) return undefined;
    const value = record[key];
    if (isRecord(value)) return value;
    this.error('INVALID_TYPE', fieldPath(base, key), `'${key}' must be an object, found ${describeValue(value)}`);
    return undefined;
  }

  optionalArray(record: JsonRecord, key: string, base: string): unknown[] | undefined {
    if (!hasField(record, key)) return undefined;
    const value = record[key];
    if (Array.isArray(value)) return value;
    this.error('INVALID_TYPE', fieldPath(base, key), `'${key}' must be a list, found ${describeValue(value)}`);
    return undefined;
  }

  asString(value: unknown, path: string): string | undefined {
    if (typeof value === 'string') return value;
    this.error('INVALID_TYPE', path, `expected a string, found ${describeValue(value)}`);
    return undefined;
  }

  asRecord(value: unknown, path: string): JsonRecord | undefined {
    if (isRecord(value)) return value;
    this.error('INVALID_TYPE', path, `expected an object, found ${describeValue(value)}`);
    return undefined;
  }

  // Visit each object entry of an optional list field, flagging non-object entries.
  eachRecord(record: JsonRecord, key: string, base: string, visit: (item: JsonRecord, path: string) => void): void {
    const list = this.optionalArray(record, key, base);
    if (!list) return;
    const listPath = fieldPath(base, key);
    list.forEach((entry, i) => {
      const path = indexPath(listPath, i);
      const item = this.asRecord(entry, path);
      if (item) visit(item, path);
    });
  }

  // Type-check each entry of an optional list of strings and return the strings found.
  stringList(record: JsonRecord, key: string, base: string): { value: string; path: string }[] {
    const list = this.optionalArray(record, key, base);
    if (!list) return [];
    const listPath = fieldPath(base, key);
    const out: { value: string; path: string }[] = [];
    list.forEach((entry, i) => {
      const path = indexPath(listPath, i);
      const value = this.asString(entry, path);
      if (value !== undefined) out.push({ value, path });
    });
    return out;
  }

  oneOf(value: string, allowed: readonly string[], path: string, label: string): boolean {
    if (allowed.includes(value)) return true;
    this.error('INVALID_ENUM', path, `invalid ${label} '${value}' (expected one of: ${allowed.join(', ')})`);
    return false;
  }
}
