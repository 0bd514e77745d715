// Validation entry point: dialect detection, policy lookup, then structural and graph passes.
// Pure and synchronous; nothing here touches I/O or shared state.

import { DiagnosticSink, JsonRecord, hasField, isRecord } from './diagnostics';
import { describeValue } from './format';
import { getPolicy, supportedDialects } from './policy-registry';
import { Diagnostic, SbomFormat, ValidateOptions, ValidationReport } from './types';
import { validateCycloneDx } from './validators/cyclonedx-validator';
import { GraphDialect, validateReferenceGraph } from './validators/reference-graph-validator';
import { validateSpdx } from './validators/spdx-validator';
import { validateSpdx3 } from './validators/spdx3-validator';

export interface DetectedDialect {
  format: SbomFormat;
  kind: GraphDialect;
  version?: string; // policy key; undefined when the declared version could not be read
  versionPath: string;
}

const SPDX3_CONTEXT = /^https:\/\/spdx\.org\/rdf\/([^/]+)\/spdx-context\.jsonld$/;

/**
 * Work out which format family a document belongs to and read its declared version.
 * Records a dialect diagnostic and returns undefined when the family cannot be told,
 * or returns a dialect without `version` when the version field is unusable.
 */
export function detectDialect(doc: JsonRecord, sink: DiagnosticSink): DetectedDialect | undefined {
  if (hasField(doc, 'bomFormat') || hasField(doc, 'specVersion')) {
    return { format: 'CycloneDX', kind: 'cyclonedx', versionPath: 'specVersion', version: readVersion(doc, 'specVersion', sink) };
  }

  if (hasField(doc, 'spdxVersion')) {
    const declared = readVersion(doc, 'spdxVersion', sink);
    const dialect: DetectedDialect = { format: 'SPDX', kind: 'spdx2', versionPath: 'spdxVersion' };
    if (declared === undefined) return dialect;
    if (!declared.startsWith('SPDX-')) {
      sink.error('UNSUPPORTED_VERSION', 'spdxVersion', `spdxVersion '${declared}' is not of the form SPDX-<major>.<minor>`);
      return dialect;
    }
    return { ...dialect, version: declared.slice('SPDX-'.length) };
  }

  if (hasField(doc, '@context') || hasField(doc, '@graph')) {
    const dialect: DetectedDialect = { format: 'SPDX', kind: 'spdx3', versionPath: '@context' };
    const context = readVersion(doc, '@context', sink);
    if (context === undefined) return dialect;
    const match = SPDX3_CONTEXT.exec(context);
    if (!match) {
      sink.error('UNSUPPORTED_VERSION', '@context', `'@context' '${context}' is not an SPDX 3 context URL`);
      return dialect;
    }
    return { ...dialect, version: match[1] };
  }

  sink.error('UNKNOWN_FORMAT', '', 'document declares neither bomFormat/specVersion, spdxVersion nor an SPDX 3 @context');
  return undefined;
}

function readVersion(doc: JsonRecord, key: string, sink: DiagnosticSink): string | undefined {
  if (!hasField(doc, key)) {
    sink.error('MISSING_FIELD', key, `missing required field '${key}'`);
    return undefined;
  }
  const value = doc[key];
  if (typeof value !== 'string') {
    sink.error('INVALID_TYPE', key, `'${key}' must be a string, found ${describeValue(value)}`);
    return undefined;
  }
  return value;
}

const stripSpdxPrefix = (version: string) => (version.startsWith('SPDX-') ? version.slice('SPDX-'.length) : version);

function buildReport(sinks: DiagnosticSink[], format?: SbomFormat, specVersion?: string): ValidationReport {
  const diagnostics: Diagnostic[] = sinks.flatMap(sink => [...sink.diagnostics]);
  const errors = diagnostics.filter(d => d.severity === 'error').length;
  return {
    overall: errors === 0 ? 'passed' : 'failed',
    format,
    specVersion,
    diagnostics,
    summary: { errors, warnings: diagnostics.length - errors }
  };
}

export function validate(document: unknown, options: ValidateOptions = {}): ValidationReport {
  if (!isRecord(document)) {
    throw new TypeError(`validate() expects a parsed SBOM object, received ${describeValue(document)}`);
  }
  const dialectSink = new DiagnosticSink('dialect');
  const structuralSink = new DiagnosticSink('structural');
  const graphSink = new DiagnosticSink('graph');
  const sinks = [dialectSink, structuralSink, graphSink];

  const dialect = detectDialect(document, dialectSink);
  if (!dialect) return buildReport(sinks);
  const { format, version } = dialect;

  if (version !== undefined) {
    if (options.expectedVersion !== undefined && stripSpdxPrefix(options.expectedVersion) !== version) {
      dialectSink.error('VERSION_MISMATCH', dialect.versionPath, `document declares ${format} ${version} but ${options.expectedVersion} was expected`);
    }

    const policy = getPolicy(format, version);
    const shapeMatches = policy !== undefined && (policy.format === 'CycloneDX'
      ? dialect.kind === 'cyclonedx'
      : (policy.serialization === 'classic') === (dialect.kind === 'spdx2'));

    if (!policy || !shapeMatches) {
      const supported = supportedDialects(format).map(d => d.version).join(', ');
      dialectSink.error('UNSUPPORTED_VERSION', dialect.versionPath, `unsupported ${format} version '${version}' (supported: ${supported})`);
    } else if (policy.format === 'CycloneDX') {
      validateCycloneDx(document, policy, structuralSink, options);
    } else if (policy.serialization === 'classic') {
      validateSpdx(document, policy, structuralSink);
    } else {
      validateSpdx3(document, policy, structuralSink);
    }
  }

  validateReferenceGraph(document, dialect.kind, graphSink);
  return buildReport(sinks, format, version);
}
