import * as yaml from 'js-yaml';
import { DEFAULT_MAX_PARALLEL } from './constants';
import { isRecord } from './diagnostics';
import { describeValue, formatDiagnostic } from './format';
import { validate } from './orchestrator';
import { loadSbomFile, SbomLoadError } from './sbom/sbom-loader';
import { CheckOptions, FileValidationResult, ValidationReport } from './types';

export * from './types';
export { validate, detectDialect } from './orchestrator';
export { POLICY_REGISTRY, getPolicy, supportedDialects } from './policy-registry';
export type { CycloneDxPolicy, SpdxPolicy, VersionPolicy } from './policy-registry';
export * from './grammar';
export { formatDiagnostic } from './format';
export { loadSbomFile, parseSbomText, detectSerialization, SbomLoadError } from './sbom/sbom-loader';
export { parseTagValue, TagValueParseError } from './sbom/tag-value-parser';
export { parseCycloneDxXml } from './sbom/cyclonedx-xml';

export type OutputFormat = 'json' | 'table' | 'yaml';

function parseFailureReport(message: string): ValidationReport {
  return {
    overall: 'failed',
    diagnostics: [{ severity: 'error', category: 'dialect', code: 'PARSE_FAILURE', path: '', message }],
    summary: { errors: 1, warnings: 0 }
  };
}

export class SbomConformanceChecker {
  async validateFile(filePath: string, options: CheckOptions = {}): Promise<FileValidationResult> {
    const start = performance.now();
    const timestamp = new Date().toISOString();
    if (options.verbose) console.log(`🔍 Validating ${filePath}...`);

    let result: FileValidationResult;
    try {
      const loaded = await loadSbomFile(filePath, options.serialization);
      const report = isRecord(loaded.document)
        ? validate(loaded.document, options)
        : parseFailureReport(`${loaded.serialization} content is a ${describeValue(loaded.document)}, not an SBOM object`);
      result = { filePath, serialization: loaded.serialization, timestamp, durationMs: performance.now() - start, report };
    } catch (e) {
      // Anything other than a load failure is a defect and propagates.
      if (!(e instanceof SbomLoadError)) throw e;
      result = { filePath, serialization: e.serialization, timestamp, durationMs: performance.now() - start, report: parseFailureReport(e.message) };
    }

    if (options.verbose) {
      const { errors, warnings } = result.report.summary;
      const status = result.report.overall === 'passed' ? '✅' : '❌';
      console.log(`${status} ${filePath}: ${errors} error(s), ${warnings} warning(s) in ${result.durationMs.toFixed(1)} ms`);
    }
    return result;
  }

  // Bounded-concurrency queue; results come back in input order.
  async validateFiles(filePaths: string[], options: CheckOptions = {}): Promise<FileValidationResult[]> {
    const maxParallel = options.maxParallel && options.maxParallel > 0 ? options.maxParallel : DEFAULT_MAX_PARALLEL;
    const results: FileValidationResult[] = new Array(filePaths.length);
    const queue = filePaths.map((filePath, index) => ({ filePath, index }));
    const running: Promise<void>[] = [];
    const failures: unknown[] = [];
    while (queue.length || running.length) {
      while (queue.length && running.length < maxParallel && !failures.length) {
        const next = queue.shift();
        if (!next) break;
        const p: Promise<void> = this.validateFile(next.filePath, options)
          .then(result => { results[next.index] = result; })
          .catch((error: unknown) => { failures.push(error); })
          .finally(() => { const idx = running.indexOf(p); if (idx >= 0) running.splice(idx, 1); });
        running.push(p);
      }
      if (running.length) await Promise.race(running);
      else if (failures.length) break;
    }
    // in-flight tasks have settled; surface the first failure
    if (failures.length) throw failures[0];
    return results;
  }

  displayResults(results: FileValidationResult[], format: OutputFormat = 'table'): void {
    if (format === 'json') {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    if (format === 'yaml') {
      console.log(yaml.dump(results, { skipInvalid: true }));
      return;
    }

    console.log('\n' + '='.repeat(60));
    console.log('📋 SBOM CONFORMANCE REPORT');
    console.log('='.repeat(60));

    for (const { filePath, serialization, report } of results) {
      const dialect = report.format ? `${report.format} ${report.specVersion ?? '?'}` : 'unknown';
      console.log(`File: ${filePath}`);
      console.log(`Dialect: ${dialect}${serialization ? ` (${serialization})` : ''}`);
      console.log(`Status: ${report.overall === 'passed' ? '✅ PASSED' : '❌ FAILED'}`);
      if (report.diagnostics.length) {
        console.log('─'.repeat(80));
        report.diagnostics.forEach(d => console.log(formatDiagnostic(d)));
      }
      console.log('─'.repeat(80));
    }

    const passed = results.filter(r => r.report.overall === 'passed').length;
    console.log('SUMMARY:');
    console.log(`Files: ${results.length}`);
    console.log(`Passed: ${passed}`);
    console.log(`Failed: ${results.length - passed}`);
    console.log('─'.repeat(80));
  }
}
