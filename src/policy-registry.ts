// Central registry of per-dialect validation policies.
// Each record captures the shape/requirement rules of one (format, version) pair; the
// structural validators read these flags instead of branching on version strings.
// Adding a dialect means adding a record here, not cloning a validator.

import { CDX_BASE_COMPONENT_TYPES, EVIDENCE_IDENTITY_FIELDS, EVIDENCE_IDENTITY_FIELDS_16 } from './constants';
import { SbomFormat } from './types';

export type ToolsShape = 'flat-list' | 'components-wrapper';
export type SupplierShape = 'string' | 'object';
export type EvidenceIdentityShape = 'object' | 'list';

export interface CycloneDxPolicy {
  format: 'CycloneDX';
  version: string;
  schemaUriRequired: boolean; // when false, $schema must be absent
  schemaUriValue?: string;
  toolsShape: ToolsShape;
  supplierShape: SupplierShape;
  componentVersionRequired: boolean;
  evidenceAllowed: boolean;
  evidenceCallstackRequiresModule: boolean;
  evidenceIdentityShape: EvidenceIdentityShape;
  evidenceIdentityFields: readonly string[];
  lifecyclesAllowed: boolean;
  vulnerabilitiesAllowed: boolean;
  componentTypes: readonly string[];
}

export interface SpdxPolicy {
  format: 'SPDX';
  version: string;
  serialization: 'classic' | 'json-ld';
  contextUri?: string; // json-ld only
  dataLicense: string;
  packageLicenseFieldsRequired: boolean;
  primaryPackagePurposeAllowed: boolean;
  packageDatesAllowed: boolean;
}

export type VersionPolicy = CycloneDxPolicy | SpdxPolicy;

const CDX_15_COMPONENT_TYPES = [...CDX_BASE_COMPONENT_TYPES, 'platform', 'device-driver', 'machine-learning-model', 'data'];

const cdxSchemaUri = (version: string) => `http://cyclonedx.org/schema/bom-${version}.schema.json`;

const POLICIES: VersionPolicy[] = [
  {
    format: 'CycloneDX',
    version: '1.3',
    schemaUriRequired: false,
    toolsShape: 'flat-list',
    supplierShape: 'string',
    componentVersionRequired: true,
    evidenceAllowed: false,
    evidenceCallstackRequiresModule: false,
    evidenceIdentityShape: 'object',
    evidenceIdentityFields: EVIDENCE_IDENTITY_FIELDS,
    lifecyclesAllowed: false,
    vulnerabilitiesAllowed: false,
    componentTypes: CDX_BASE_COMPONENT_TYPES
  },
  {
    format: 'CycloneDX',
    version: '1.4',
    schemaUriRequired: true,
    schemaUriValue: cdxSchemaUri('1.4'),
    toolsShape: 'flat-list',
    supplierShape: 'object',
    componentVersionRequired: false,
    evidenceAllowed: false,
    evidenceCallstackRequiresModule: false,
    evidenceIdentityShape: 'object',
    evidenceIdentityFields: EVIDENCE_IDENTITY_FIELDS,
    lifecyclesAllowed: false,
    vulnerabilitiesAllowed: true,
    componentTypes: CDX_BASE_COMPONENT_TYPES
  },
  {
    format: 'CycloneDX',
    version: '1.5',
    schemaUriRequired: true,
    schemaUriValue: cdxSchemaUri('1.5'),
    toolsShape: 'components-wrapper',
    supplierShape: 'object',
    componentVersionRequired: false,
    evidenceAllowed: true,
    evidenceCallstackRequiresModule: true,
    evidenceIdentityShape: 'object',
    evidenceIdentityFields: EVIDENCE_IDENTITY_FIELDS,
    lifecyclesAllowed: true,
    vulnerabilitiesAllowed: true,
    componentTypes: CDX_15_COMPONENT_TYPES
  },
  {
    format: 'CycloneDX',
    version: '1.6',
    schemaUriRequired: true,
    schemaUriValue: cdxSchemaUri('1.6'),
    toolsShape: 'components-wrapper',
    supplierShape: 'object',
    componentVersionRequired: false,
    evidenceAllowed: true,
    evidenceCallstackRequiresModule: false,
    evidenceIdentityShape: 'list',
    evidenceIdentityFields: EVIDENCE_IDENTITY_FIELDS_16,
    lifecyclesAllowed: true,
    vulnerabilitiesAllowed: true,
    componentTypes: [...CDX_15_COMPONENT_TYPES, 'cryptographic-asset']
  },
  {
    format: 'SPDX',
    version: '2.2',
    serialization: 'classic',
    dataLicense: 'CC0-1.0',
    packageLicenseFieldsRequired: true,
    primaryPackagePurposeAllowed: false,
    packageDatesAllowed: false
  },
  {
    format: 'SPDX',
    version: '2.3',
    serialization: 'classic',
    dataLicense: 'CC0-1.0',
    packageLicenseFieldsRequired: false,
    primaryPackagePurposeAllowed: true,
    packageDatesAllowed: true
  },
  {
    format: 'SPDX',
    version: '3.0.0',
    serialization: 'json-ld',
    contextUri: 'https://spdx.org/rdf/3.0.0/spdx-context.jsonld',
    dataLicense: 'CC0-1.0',
    packageLicenseFieldsRequired: false,
    primaryPackagePurposeAllowed: true,
    packageDatesAllowed: true
  },
  {
    format: 'SPDX',
    version: '3.0.1',
    serialization: 'json-ld',
    contextUri: 'https://spdx.org/rdf/3.0.1/spdx-context.jsonld',
    dataLicense: 'CC0-1.0',
    packageLicenseFieldsRequired: false,
    primaryPackagePurposeAllowed: true,
    packageDatesAllowed: true
  }
];

export const POLICY_REGISTRY: readonly VersionPolicy[] = Object.freeze(POLICIES);

// Exact match only; an unknown version must surface as unsupported, never as a neighbour's policy.
export function getPolicy(format: SbomFormat, version: string): VersionPolicy | undefined {
  return POLICY_REGISTRY.find(p => p.format === format && p.version === version);
}

export function supportedDialects(format?: SbomFormat): { format: SbomFormat; version: string }[] {
  return POLICY_REGISTRY
    .filter(p => !format || p.format === format)
    .map(p => ({ format: p.format, version: p.version }));
}
