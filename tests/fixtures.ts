import { CdxComponent, CdxDocument, SpdxDocument, Spdx3Document } from '../src/types';

export const SHA256 = 'a'.repeat(64);
export const SHA1 = 'b'.repeat(40);
export const SERIAL = 'urn:uuid:3e671687-395b-41f5-a30f-a58921a69b79';
export const TIMESTAMP = '2024-05-01T12:00:00Z';

export type CdxVersion = '1.3' | '1.4' | '1.5' | '1.6';
export const CDX_VERSIONS: CdxVersion[] = ['1.3', '1.4', '1.5', '1.6'];

export function library(ref: string, extra: Partial<CdxComponent> = {}): CdxComponent {
  return { type: 'library', 'bom-ref': ref, name: ref, version: '1.0.0', ...extra };
}

// Minimal document that passes under the given version's policy.
export function cdxDocument(specVersion: CdxVersion): CdxDocument {
  const legacyTools = specVersion === '1.3' || specVersion === '1.4';
  const doc: CdxDocument = {
    bomFormat: 'CycloneDX',
    specVersion,
    serialNumber: SERIAL,
    version: 1,
    metadata: {
      timestamp: TIMESTAMP,
      tools: legacyTools
        ? [{ vendor: 'acme', name: 'sbom-tool', version: '1.0.0' }]
        : { components: [{ type: 'application', name: 'sbom-tool', version: '1.0.0' }] },
      component: { type: 'application', 'bom-ref': 'app', name: 'app', version: '1.0.0' }
    },
    components: [
      library('lib', {
        hashes: [{ alg: 'SHA-256', content: SHA256 }],
        licenses: [{ license: { id: 'MIT' } }],
        purl: 'pkg:npm/lib@1.0.0'
      })
    ],
    dependencies: [{ ref: 'app', dependsOn: ['lib'] }]
  };
  if (specVersion !== '1.3') doc.$schema = `http://cyclonedx.org/schema/bom-${specVersion}.schema.json`;
  return doc;
}

export function spdxDocument(version: '2.2' | '2.3'): SpdxDocument {
  return {
    spdxVersion: `SPDX-${version}`,
    dataLicense: 'CC0-1.0',
    SPDXID: 'SPDXRef-DOCUMENT',
    name: 'example',
    documentNamespace: 'https://example.com/spdx/example-1',
    creationInfo: { created: TIMESTAMP, creators: ['Tool: sbom-tool-1.0'] },
    documentDescribes: ['SPDXRef-Package-app'],
    packages: [
      {
        SPDXID: 'SPDXRef-Package-app',
        name: 'app',
        versionInfo: '1.0.0',
        downloadLocation: 'NOASSERTION',
        filesAnalyzed: false,
        checksums: [{ algorithm: 'SHA256', checksumValue: SHA256 }],
        licenseConcluded: 'MIT',
        licenseDeclared: 'MIT',
        copyrightText: 'NOASSERTION'
      }
    ],
    files: [
      { SPDXID: 'SPDXRef-File-main', fileName: './main.js', checksums: [{ algorithm: 'SHA1', checksumValue: SHA1 }] }
    ],
    relationships: [
      { spdxElementId: 'SPDXRef-DOCUMENT', relationshipType: 'DESCRIBES', relatedSpdxElement: 'SPDXRef-Package-app' },
      { spdxElementId: 'SPDXRef-Package-app', relationshipType: 'CONTAINS', relatedSpdxElement: 'SPDXRef-File-main' }
    ]
  };
}

export const SPDX3_IDS = {
  tool: 'https://example.com/agents/sbom-tool',
  doc: 'https://example.com/doc',
  pkg: 'https://example.com/pkg/app',
  file: 'https://example.com/file/main',
  rel: 'https://example.com/rel/1'
};

export function spdx3Document(version: '3.0.0' | '3.0.1'): Spdx3Document {
  return {
    '@context': `https://spdx.org/rdf/${version}/spdx-context.jsonld`,
    '@graph': [
      { type: 'CreationInfo', '@id': '_:creationinfo', specVersion: version, created: TIMESTAMP, createdBy: [SPDX3_IDS.tool] },
      { type: 'Tool', spdxId: SPDX3_IDS.tool, creationInfo: '_:creationinfo', name: 'sbom-tool' },
      {
        type: 'SpdxDocument',
        spdxId: SPDX3_IDS.doc,
        creationInfo: '_:creationinfo',
        rootElement: [SPDX3_IDS.pkg],
        element: [SPDX3_IDS.pkg, SPDX3_IDS.file]
      },
      {
        type: 'software_Package',
        spdxId: SPDX3_IDS.pkg,
        creationInfo: '_:creationinfo',
        name: 'app',
        software_packageVersion: '1.0.0',
        software_packageUrl: 'pkg:npm/app@1.0.0',
        software_downloadLocation: 'https://example.com/app-1.0.0.tgz',
        verifiedUsing: [{ type: 'Hash', algorithm: 'sha256', hashValue: SHA256 }]
      },
      { type: 'software_File', spdxId: SPDX3_IDS.file, creationInfo: '_:creationinfo', name: 'main.js' },
      {
        type: 'Relationship',
        spdxId: SPDX3_IDS.rel,
        creationInfo: '_:creationinfo',
        from: SPDX3_IDS.pkg,
        to: [SPDX3_IDS.file],
        relationshipType: 'contains'
      }
    ]
  };
}

export const TAG_VALUE_DOCUMENT = `SPDXVersion: SPDX-2.3
DataLicense: CC0-1.0
SPDXID: SPDXRef-DOCUMENT
DocumentName: example
DocumentNamespace: https://example.com/spdx/example-1
# creation info
Creator: Tool: sbom-tool-1.0
Created: ${TIMESTAMP}

PackageName: app
SPDXID: SPDXRef-Package-app
PackageVersion: 1.0.0
PackageDownloadLocation: NOASSERTION
FilesAnalyzed: false
PackageChecksum: SHA256: ${SHA256}
PackageLicenseConcluded: MIT
PackageLicenseDeclared: MIT
PackageCopyrightText: <text>Copyright 2024
Example Authors</text>
ExternalRef: PACKAGE-MANAGER purl pkg:npm/app@1.0.0

FileName: ./main.js
SPDXID: SPDXRef-File-main
FileChecksum: SHA1: ${SHA1}

Relationship: SPDXRef-DOCUMENT DESCRIBES SPDXRef-Package-app
Relationship: SPDXRef-Package-app CONTAINS SPDXRef-File-main
`;

export const CDX_XML_DOCUMENT = `<?xml version="1.0" encoding="UTF-8"?>
<bom xmlns="http://cyclonedx.org/schema/bom/1.4" serialNumber="${SERIAL}" version="1">
  <metadata>
    <timestamp>${TIMESTAMP}</timestamp>
    <tools>
      <tool><vendor>acme</vendor><name>sbom-tool</name><version>1.0.0</version></tool>
    </tools>
    <component type="application" bom-ref="app"><name>app</name><version>1.0.0</version></component>
  </metadata>
  <components>
    <component type="library" bom-ref="lib">
      <name>lib</name>
      <version>1.0.0</version>
      <hashes><hash alg="SHA-256">${SHA256}</hash></hashes>
      <licenses><license><id>MIT</id></license></licenses>
      <purl>pkg:npm/lib@1.0.0</purl>
    </component>
  </components>
  <dependencies>
    <dependency ref="app"><dependency ref="lib"/></dependency>
    <dependency ref="lib"/>
  </dependencies>
</bom>
`;
