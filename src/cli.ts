#!/usr/bin/env node
// sbom-lint CLI
// Usage: sbom-lint <files...> [--format table|json|yaml] [--strict-uuid] [--expect-version X]

import { parseArgs } from 'node:util';
import { SbomConformanceChecker, OutputFormat } from './index';
import { TOOL_NAME } from './constants';
import { SbomSerialization } from './types';

const FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml'];
const SERIALIZATIONS: readonly SbomSerialization[] = ['json', 'yaml', 'tag-value', 'xml'];

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

function printUsage(): void {
  process.stderr.write(
    `Usage: sbom-lint <file...> [options]

Validates CycloneDX (1.3-1.6) and SPDX (2.2, 2.3, 3.0.x) documents in JSON, YAML,
SPDX tag-value or CycloneDX XML form.

Options:
  --format <type>          Output: table (default), json or yaml
  --serialization <type>   Force json, yaml, tag-value or xml instead of sniffing
  --strict-uuid            Require RFC 4122 version/variant bits in serialNumber
  --expect-version <ver>   Fail documents that declare another version
  --max-parallel <n>       Files validated concurrently (default: 4)
  --verbose                Per-file progress
  --help, -h               Show this help

Exit status: 0 all passed, 1 a document failed, 2 usage error.
`
  );
}

const isOneOf = <T extends string>(allowed: readonly T[], value: string): value is T =>
  allowed.some(a => a === value);

export async function runCli(argv: string[]): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      options: {
        format: { type: 'string', default: 'table' },
        serialization: { type: 'string' },
        'strict-uuid': { type: 'boolean', default: false },
        'expect-version': { type: 'string' },
        'max-parallel': { type: 'string' },
        verbose: { type: 'boolean', default: false },
        help: { type: 'boolean', default: false, short: 'h' }
      },
      allowPositionals: true,
      strict: true
    });
  } catch (err) {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    printUsage();
    return EXIT_USAGE;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    printUsage();
    return EXIT_OK;
  }
  if (positionals.length === 0) {
    process.stderr.write('Error: no SBOM files given\n');
    printUsage();
    return EXIT_USAGE;
  }

  const format = values.format ?? 'table';
  if (!isOneOf(FORMATS, format)) {
    process.stderr.write(`Error: unknown --format '${format}' (expected ${FORMATS.join(', ')})\n`);
    return EXIT_USAGE;
  }

  const serialization = values.serialization;
  if (serialization !== undefined && !isOneOf(SERIALIZATIONS, serialization)) {
    process.stderr.write(`Error: unknown --serialization '${serialization}' (expected ${SERIALIZATIONS.join(', ')})\n`);
    return EXIT_USAGE;
  }

  let maxParallel: number | undefined;
  const maxParallelArg = values['max-parallel'];
  if (maxParallelArg !== undefined) {
    maxParallel = parseInt(maxParallelArg, 10);
    if (isNaN(maxParallel) || maxParallel < 1) {
      process.stderr.write(`Error: --max-parallel must be a positive integer\n`);
      return EXIT_USAGE;
    }
  }

  const checker = new SbomConformanceChecker();
  if (values.verbose) console.log(`${TOOL_NAME}: validating ${positionals.length} file(s)`);
  const results = await checker.validateFiles(positionals, {
    serialization,
    strictUuid: values['strict-uuid'] || undefined,
    expectedVersion: values['expect-version'],
    maxParallel,
    verbose: values.verbose
  });
  checker.displayResults(results, format);
  return results.every(r => r.report.overall === 'passed') ? EXIT_OK : EXIT_FAILED;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(code => { process.exitCode = code; })
    .catch(err => {
      process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = EXIT_FAILED;
    });
}
