// Formatting helpers for diagnostic paths and report output.

import { SEVERITY_EMOJI } from './constants';
import { Diagnostic } from './types';

// Dotted field path; the document root is the empty string.
export function fieldPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

export function indexPath(base: string, index: number): string {
  return `${base}[${index}]`;
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') return 'object';
  return typeof value;
}

export function formatDiagnostic(d: Diagnostic): string {
  return `${SEVERITY_EMOJI[d.severity]} ${d.severity.toUpperCase()} [${d.code}] ${d.path || '<document>'}: ${d.message}`;
}
