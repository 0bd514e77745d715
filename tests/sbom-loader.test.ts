import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { detectSerialization, loadSbomFile, parseSbomText, SbomLoadError } from '../src/sbom/sbom-loader';
import { parseCycloneDxXml } from '../src/sbom/cyclonedx-xml';
import { validate } from '../src/orchestrator';
import { CDX_XML_DOCUMENT, SERIAL, SHA256, TAG_VALUE_DOCUMENT, TIMESTAMP, cdxDocument, spdxDocument } from './fixtures';

describe('SBOM loader', () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sbom-lint-'));
  });

  afterAll(async () => {
    await fs.remove(tmpDir);
  });

  async function writeFixture(name: string, content: string): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await fs.writeFile(filePath, content, 'utf8');
    return filePath;
  }

  describe('detectSerialization', () => {
    it('prefers the file extension', () => {
      expect(detectSerialization('bom.json', '')).toBe('json');
      expect(detectSerialization('bom.cdx.xml', '')).toBe('xml');
      expect(detectSerialization('bom.YML', '')).toBe('yaml');
      expect(detectSerialization('doc.spdx', '')).toBe('tag-value');
    });

    it('sniffs content when the extension says nothing', () => {
      expect(detectSerialization('bom', '  {"bomFormat": "CycloneDX"}')).toBe('json');
      expect(detectSerialization('bom', '<bom/>')).toBe('xml');
      expect(detectSerialization('doc.txt', '# generated\nSPDXVersion: SPDX-2.3')).toBe('tag-value');
      expect(detectSerialization('bom.txt', 'bomFormat: CycloneDX')).toBe('yaml');
    });
  });

  it('loads a JSON file', async () => {
    const filePath = await writeFixture('bom.json', JSON.stringify(cdxDocument('1.5')));
    const loaded = await loadSbomFile(filePath);
    expect(loaded).toEqual({ filePath, serialization: 'json', document: cdxDocument('1.5') });
  });

  it('loads a YAML file back to the same tree', async () => {
    const filePath = await writeFixture('bom.yaml', yaml.dump(spdxDocument('2.3')));
    const loaded = await loadSbomFile(filePath);
    expect(loaded.serialization).toBe('yaml');
    expect(loaded.document).toEqual(spdxDocument('2.3'));
  });

  it('keeps unquoted YAML timestamps and versions as strings', async () => {
    const document = await parseSbomText(`metadata:\n  timestamp: ${TIMESTAMP}\nspecVersion: "1.4"\n`, 'yaml');
    expect(document).toEqual({ metadata: { timestamp: TIMESTAMP }, specVersion: '1.4' });
  });

  it('loads a tag-value file into a passing report', async () => {
    const filePath = await writeFixture('doc.spdx', TAG_VALUE_DOCUMENT);
    const loaded = await loadSbomFile(filePath);
    expect(loaded.serialization).toBe('tag-value');
    expect(validate(loaded.document).overall).toBe('passed');
  });

  it('honours an explicit serialization hint', async () => {
    const filePath = await writeFixture('doc.json', TAG_VALUE_DOCUMENT);
    const loaded = await loadSbomFile(filePath, 'tag-value');
    expect(loaded.serialization).toBe('tag-value');
  });

  it('wraps a parse failure with the file and serialization', async () => {
    const filePath = await writeFixture('broken.json', '{"bomFormat": ');
    await expect(loadSbomFile(filePath)).rejects.toBeInstanceOf(SbomLoadError);
    await expect(loadSbomFile(filePath)).rejects.toMatchObject({ filePath, serialization: 'json' });
    await expect(loadSbomFile(filePath)).rejects.toThrow(/^json parse failed: /);
  });

  it('wraps a read failure', async () => {
    const filePath = path.join(tmpDir, 'missing.json');
    await expect(loadSbomFile(filePath)).rejects.toMatchObject({ name: 'SbomLoadError', filePath, serialization: undefined });
    await expect(loadSbomFile(filePath)).rejects.toThrow(`cannot read ${filePath}: `);
  });

  it('refuses files above the size limit', async () => {
    const previous = process.env.SBOMLINT_MAX_FILE_BYTES;
    process.env.SBOMLINT_MAX_FILE_BYTES = '16';
    try {
      // limits are read once at module load, so take a fresh copy of the loader
      jest.resetModules();
      const loader: typeof import('../src/sbom/sbom-loader') = require('../src/sbom/sbom-loader');
      const filePath = await writeFixture('large.json', JSON.stringify(cdxDocument('1.4')));
      await expect(loader.loadSbomFile(filePath)).rejects.toThrow(/above the 16 byte limit$/);
    } finally {
      if (previous === undefined) delete process.env.SBOMLINT_MAX_FILE_BYTES;
      else process.env.SBOMLINT_MAX_FILE_BYTES = previous;
    }
  });
});

describe('CycloneDX XML mapping', () => {
  it('maps a bom onto the JSON field names', async () => {
    expect(await parseCycloneDxXml(CDX_XML_DOCUMENT)).toEqual({
      bomFormat: 'CycloneDX',
      $schema: 'http://cyclonedx.org/schema/bom-1.4.schema.json',
      specVersion: '1.4',
      serialNumber: SERIAL,
      version: 1,
      metadata: {
        timestamp: TIMESTAMP,
        tools: [{ vendor: 'acme', name: 'sbom-tool', version: '1.0.0' }],
        component: { type: 'application', 'bom-ref': 'app', name: 'app', version: '1.0.0' }
      },
      components: [{
        type: 'library',
        'bom-ref': 'lib',
        name: 'lib',
        version: '1.0.0',
        hashes: [{ alg: 'SHA-256', content: SHA256 }],
        licenses: [{ license: { id: 'MIT' } }],
        purl: 'pkg:npm/lib@1.0.0'
      }],
      dependencies: [{ ref: 'app', dependsOn: ['lib'] }, { ref: 'lib' }]
    });
  });

  it('validates a loaded XML file', async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sbom-lint-xml-'));
    try {
      const filePath = path.join(tmpDir, 'bom.xml');
      await fs.writeFile(filePath, CDX_XML_DOCUMENT, 'utf8');
      const loaded = await loadSbomFile(filePath);
      expect(loaded.serialization).toBe('xml');
      expect(validate(loaded.document).diagnostics).toEqual([]);
    } finally {
      await fs.remove(tmpDir);
    }
  });

  it('maps the tools wrapper of newer versions', async () => {
    const doc = await parseCycloneDxXml(
      '<bom xmlns="http://cyclonedx.org/schema/bom/1.5" version="1"><metadata><tools><components>' +
      '<component type="application"><name>sbom-tool</name></component>' +
      '</components></tools></metadata></bom>'
    );
    expect(doc.metadata).toEqual({ tools: { components: [{ type: 'application', name: 'sbom-tool' }] } });
  });

  const WRAPPED_TOOLS = '<tools><components><component type="application"><name>sbom-tool</name><version>1.0.0</version></component></components></tools>';

  // The fixture bom under another namespace version, with extra elements in the library component.
  function xmlWithLibrary(version: string, extra: string): string {
    let text = CDX_XML_DOCUMENT.replace('bom/1.4', `bom/${version}`).replace('<purl>', `${extra}<purl>`);
    if (version === '1.5' || version === '1.6') text = text.replace(/<tools>[\s\S]*?<\/tools>/, WRAPPED_TOOLS);
    return text;
  }

  it('keeps component evidence so older versions reject it', async () => {
    const doc = await parseCycloneDxXml(xmlWithLibrary('1.3', '<evidence><licenses><license><id>MIT</id></license></licenses></evidence>'));
    expect(doc.components).toMatchObject([{ evidence: { licenses: [{ license: { id: 'MIT' } }] } }]);
    expect(validate(doc).diagnostics).toEqual([{
      severity: 'error',
      category: 'structural',
      code: 'NOT_AVAILABLE',
      path: 'components[0].evidence',
      message: "'evidence' is not available in CycloneDX 1.3"
    }]);
  });

  it('maps evidence identity as a single object for 1.5 and applies its rules', async () => {
    const doc = await parseCycloneDxXml(xmlWithLibrary('1.5',
      '<evidence>' +
      '<identity><field>purl</field><confidence>high</confidence></identity>' +
      '<occurrences><occurrence bom-ref="occ-1"/></occurrences>' +
      '<callstack><frames><frame><function>main</function><line>12</line></frame></frames></callstack>' +
      '</evidence>'));
    expect(doc.components).toMatchObject([{
      evidence: {
        identity: { field: 'purl', confidence: 'high' },
        occurrences: [{ 'bom-ref': 'occ-1' }],
        callstack: { frames: [{ function: 'main', line: 12 }] }
      }
    }]);
    expect(validate(doc).diagnostics).toEqual([
      {
        severity: 'error',
        category: 'structural',
        code: 'INVALID_VALUE',
        path: 'components[0].evidence.identity.confidence',
        message: 'confidence must be a number between 0 and 1, found "high"'
      },
      {
        severity: 'error',
        category: 'structural',
        code: 'MISSING_FIELD',
        path: 'components[0].evidence.occurrences[0].location',
        message: "missing required field 'location'"
      },
      {
        severity: 'error',
        category: 'structural',
        code: 'MISSING_FIELD',
        path: 'components[0].evidence.callstack.frames[0].module',
        message: "missing required field 'module' (required in CycloneDX 1.5)"
      }
    ]);
  });

  it('maps evidence identity as a list for 1.6', async () => {
    const doc = await parseCycloneDxXml(xmlWithLibrary('1.6',
      '<evidence>' +
      '<identity><field>purl</field><confidence>1</confidence>' +
      '<methods><method><technique>manifest-analysis</technique><confidence>0.8</confidence></method></methods></identity>' +
      '<occurrences><occurrence><location>/lib/index.js</location></occurrence></occurrences>' +
      '<copyright><text>Copyright Acme</text></copyright>' +
      '</evidence>'));
    expect(doc.components).toMatchObject([{
      evidence: {
        identity: [{ field: 'purl', confidence: 1, methods: [{ technique: 'manifest-analysis', confidence: 0.8 }] }],
        occurrences: [{ location: '/lib/index.js' }],
        copyright: [{ text: 'Copyright Acme' }]
      }
    }]);
    expect(validate(doc).diagnostics).toEqual([]);
  });

  it('maps a 1.3 supplier to its name', async () => {
    const doc = await parseCycloneDxXml(xmlWithLibrary('1.3', '<supplier><name>Acme</name><url>https://acme.example</url></supplier>'));
    expect(doc.components).toMatchObject([{ supplier: 'Acme' }]);
    expect(validate(doc).diagnostics).toEqual([]);
  });

  it('keeps the supplier as an entity from 1.4', async () => {
    const doc = await parseCycloneDxXml(xmlWithLibrary('1.4', '<supplier><name>Acme</name><url>https://acme.example</url></supplier>'));
    expect(doc.components).toMatchObject([{ supplier: { name: 'Acme', url: ['https://acme.example'] } }]);
    expect(validate(doc).diagnostics).toEqual([]);
  });

  it('rejects a document whose root is not a bom', async () => {
    await expect(parseCycloneDxXml('<project/>')).rejects.toThrow('XML document root is not a CycloneDX <bom> element');
  });
});
