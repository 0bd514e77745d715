import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { runCli, EXIT_FAILED, EXIT_OK, EXIT_USAGE } from '../src/cli';
import { cdxDocument } from './fixtures';

describe('sbom-lint CLI', () => {
  let tmpDir: string;
  let goodFile: string;
  let badFile: string;
  let logSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sbom-lint-cli-'));
    goodFile = path.join(tmpDir, 'good.json');
    badFile = path.join(tmpDir, 'bad.json');
    await fs.writeJson(goodFile, cdxDocument('1.4'));
    await fs.writeJson(badFile, { ...cdxDocument('1.4'), bomFormat: 'SPDX' });
  });

  afterAll(async () => {
    await fs.remove(tmpDir);
  });

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const stderr = () => stderrSpy.mock.calls.map(call => String(call[0])).join('');

  it('exits 0 when every document passes', async () => {
    expect(await runCli([goodFile])).toBe(EXIT_OK);
  });

  it('exits 1 when a document fails', async () => {
    expect(await runCli([goodFile, badFile])).toBe(EXIT_FAILED);
  });

  it('prints JSON results on request', async () => {
    await runCli([goodFile, '--format', 'json']);
    expect(logSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(printed).toMatchObject([{ filePath: goodFile, serialization: 'json', report: { overall: 'passed' } }]);
  });

  it('fails a document that declares an unexpected version', async () => {
    expect(await runCli([goodFile, '--expect-version', '1.5'])).toBe(EXIT_FAILED);
  });

  it('exits 2 without files', async () => {
    expect(await runCli([])).toBe(EXIT_USAGE);
    expect(stderr()).toContain('Error: no SBOM files given\n');
  });

  it('exits 2 on bad option values', async () => {
    expect(await runCli([goodFile, '--format', 'xml'])).toBe(EXIT_USAGE);
    expect(stderr()).toContain("Error: unknown --format 'xml' (expected table, json, yaml)\n");
    expect(await runCli([goodFile, '--serialization', 'cbor'])).toBe(EXIT_USAGE);
    expect(await runCli([goodFile, '--max-parallel', '0'])).toBe(EXIT_USAGE);
  });

  it('exits 2 on an unknown option', async () => {
    expect(await runCli([goodFile, '--bogus'])).toBe(EXIT_USAGE);
  });

  it('prints usage for --help', async () => {
    expect(await runCli(['-h'])).toBe(EXIT_OK);
    expect(stderr()).toMatch(/^Usage: sbom-lint <file\.\.\.> \[options\]/);
  });
});
