import { validate } from '../src/orchestrator';
import { Diagnostic, Spdx3Document, Spdx3Element } from '../src/types';
import { SPDX3_IDS, TIMESTAMP, spdx3Document } from './fixtures';

function structural(code: Diagnostic['code'], path: string, message: string): Diagnostic {
  return { severity: 'error', category: 'structural', code, path, message };
}

function mapGraph(doc: Spdx3Document, type: string, change: (element: Spdx3Element) => Spdx3Element): Spdx3Document {
  return { ...doc, '@graph': doc['@graph'].map(e => (e.type === type ? change(e) : e)) };
}

describe('SPDX 3 structural validation', () => {
  it.each(['3.0.0', '3.0.1'] as const)('accepts a minimal SPDX %s graph', version => {
    const report = validate(spdx3Document(version));
    expect(report.overall).toBe('passed');
    expect(report.format).toBe('SPDX');
    expect(report.specVersion).toBe(version);
    expect(report.diagnostics).toEqual([]);
  });

  it('requires CreationInfo to declare the document version', () => {
    const doc = mapGraph(spdx3Document('3.0.1'), 'CreationInfo', e => ({ ...e, specVersion: '3.0.0' }));
    expect(validate(doc).diagnostics).toEqual([
      structural('INVALID_VALUE', '@graph[0].specVersion', "CreationInfo specVersion must be '3.0.1', found '3.0.0'")
    ]);
  });

  it('requires exactly one SpdxDocument element', () => {
    const doc = spdx3Document('3.0.1');
    const withoutDocument = { ...doc, '@graph': doc['@graph'].filter(e => e.type !== 'SpdxDocument') };
    expect(validate(withoutDocument).diagnostics).toEqual([
      structural('INVALID_VALUE', '@graph', 'expected exactly one SpdxDocument element, found 0')
    ]);
  });

  it('checks relationship targets and types', () => {
    const empty = mapGraph(spdx3Document('3.0.1'), 'Relationship', e => ({ ...e, to: [] }));
    expect(validate(empty).diagnostics).toEqual([
      structural('INVALID_VALUE', '@graph[5].to', "'to' must list at least one element")
    ]);

    const unknown = mapGraph(spdx3Document('3.0.1'), 'Relationship', e => ({ ...e, relationshipType: 'uses' }));
    expect(validate(unknown).diagnostics).toMatchObject([
      { code: 'INVALID_ENUM', path: '@graph[5].relationshipType' }
    ]);
  });

  it('requires a name on packages and files', () => {
    const doc = mapGraph(spdx3Document('3.0.0'), 'software_Package', e => {
      const { name, ...rest } = e;
      return rest;
    });
    expect(validate(doc).diagnostics).toEqual([
      structural('MISSING_FIELD', '@graph[3].name', "missing required field 'name'")
    ]);
  });

  it('requires spdxId on non-CreationInfo elements', () => {
    const doc = mapGraph(spdx3Document('3.0.1'), 'Tool', e => {
      const { spdxId, ...rest } = e;
      return rest;
    });
    expect(validate(doc).diagnostics).toEqual([
      structural('MISSING_FIELD', '@graph[1].spdxId', "missing required field 'spdxId'")
    ]);
  });

  it('checks verifiedUsing hashes', () => {
    const shortHash = mapGraph(spdx3Document('3.0.1'), 'software_Package', e => ({
      ...e,
      verifiedUsing: [{ type: 'Hash', algorithm: 'sha256', hashValue: 'abc' }]
    }));
    expect(validate(shortHash).diagnostics).toEqual([
      structural('INVALID_FORMAT', '@graph[3].verifiedUsing[0].hashValue', 'sha256 content must be 64 hex digits, found 3')
    ]);

    const upperCase = mapGraph(spdx3Document('3.0.1'), 'software_Package', e => ({
      ...e,
      verifiedUsing: [{ type: 'Hash', algorithm: 'SHA256', hashValue: 'a'.repeat(64) }]
    }));
    expect(validate(upperCase).diagnostics).toEqual([
      structural('INVALID_ENUM', '@graph[3].verifiedUsing[0].algorithm', "unknown hash algorithm 'SHA256'")
    ]);
  });

  it('checks package url and download location grammars', () => {
    const doc = mapGraph(spdx3Document('3.0.1'), 'software_Package', e => ({
      ...e,
      software_packageUrl: 'npm/app',
      software_downloadLocation: 'example.com/app.tgz'
    }));
    expect(validate(doc).diagnostics).toEqual([
      structural('INVALID_FORMAT', '@graph[3].software_packageUrl', "'npm/app' does not start with 'pkg:'"),
      structural('INVALID_FORMAT', '@graph[3].software_downloadLocation', "'example.com/app.tgz' has no URL scheme")
    ]);
  });

  it('validates an inline creationInfo object', () => {
    const doc = mapGraph(spdx3Document('3.0.1'), 'Tool', e => ({
      ...e,
      creationInfo: { type: 'CreationInfo', specVersion: '3.0.1', created: TIMESTAMP }
    }));
    expect(validate(doc).diagnostics).toEqual([
      structural('MISSING_FIELD', '@graph[1].creationInfo.createdBy', "missing required field 'createdBy'")
    ]);
  });

  it('requires @graph to be a list', () => {
    const report = validate({ '@context': 'https://spdx.org/rdf/3.0.1/spdx-context.jsonld', '@graph': { spdxId: SPDX3_IDS.doc } });
    expect(report.diagnostics).toEqual([
      structural('SHAPE_MISMATCH', '@graph', "'@graph' must be a list of elements, found object")
    ]);
  });
});
