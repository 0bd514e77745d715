// Wire-level SBOM shapes plus the diagnostic/report contract shared by validators.
// Enum-valued fields are plain strings: membership is checked at validation time,
// since documents arrive from untrusted serializations.

export type SbomFormat = 'CycloneDX' | 'SPDX';

// ---- CycloneDX ----

export interface CdxHash {
  alg: string;
  content: string;
}

export interface CdxContact {
  name?: string;
  email?: string;
  phone?: string;
}

export interface CdxOrganizationalEntity {
  name?: string;
  url?: string[];
  contact?: CdxContact[];
}

export interface CdxLicense {
  id?: string;
  name?: string;
  url?: string;
}

// Exactly one of license / expression must be set.
export interface CdxLicenseChoice {
  license?: CdxLicense;
  expression?: string;
}

export interface CdxProperty {
  name?: string;
  value?: string;
}

export interface CdxExternalReference {
  url: string;
  type: string;
  comment?: string;
  hashes?: CdxHash[];
}

export interface CdxSwid {
  tagId?: string;
  name?: string;
  version?: string;
}

export interface CdxIdentifiableAction {
  timestamp?: string;
  name?: string;
  email?: string;
}

export interface CdxCommit {
  uid?: string;
  url?: string;
  author?: CdxIdentifiableAction;
  committer?: CdxIdentifiableAction;
  message?: string;
}

export interface CdxPatch {
  type?: string;
  diff?: { url?: string };
}

export interface CdxPedigree {
  ancestors?: CdxComponent[];
  descendants?: CdxComponent[];
  variants?: CdxComponent[];
  commits?: CdxCommit[];
  patches?: CdxPatch[];
  notes?: string;
}

export interface CdxEvidenceIdentity {
  field?: string;
  confidence?: number;
  methods?: { technique?: string; confidence?: number; value?: string }[];
}

export interface CdxCallstackFrame {
  package?: string;
  module?: string;
  function?: string;
  line?: number;
}

export interface CdxEvidence {
  identity?: CdxEvidenceIdentity | CdxEvidenceIdentity[]; // object in 1.5, list in 1.6
  occurrences?: { location?: string; 'bom-ref'?: string }[];
  callstack?: { frames?: CdxCallstackFrame[] };
  licenses?: CdxLicenseChoice[];
  copyright?: { text: string }[];
}

export interface CdxComponent {
  type: string;
  name: string;
  'bom-ref'?: string;
  version?: string; // required in 1.3
  group?: string;
  scope?: string;
  supplier?: string | CdxOrganizationalEntity; // string in 1.3, object from 1.4
  hashes?: CdxHash[];
  licenses?: CdxLicenseChoice[];
  purl?: string;
  cpe?: string;
  'mime-type'?: string;
  swid?: CdxSwid;
  pedigree?: CdxPedigree;
  evidence?: CdxEvidence;
  properties?: CdxProperty[];
  externalReferences?: CdxExternalReference[];
  components?: CdxComponent[];
}

export interface CdxServiceData {
  flow?: string;
  classification?: string;
}

export interface CdxService {
  name: string;
  'bom-ref'?: string;
  version?: string;
  provider?: CdxOrganizationalEntity;
  endpoints?: string[];
  data?: CdxServiceData[];
  externalReferences?: CdxExternalReference[];
  services?: CdxService[];
}

export interface CdxDependency {
  ref: string;
  dependsOn?: string[];
}

export interface CdxComposition {
  aggregate: string;
  assemblies?: string[];
  dependencies?: string[];
}

// Legacy (1.3/1.4) tool entry
export interface CdxTool {
  vendor?: string;
  name?: string;
  version?: string;
  hashes?: CdxHash[];
}

export interface CdxLifecycle {
  phase?: string;
  name?: string;
}

export interface CdxMetadata {
  timestamp?: string;
  tools?: CdxTool[] | { components?: CdxComponent[]; services?: CdxService[] };
  authors?: CdxContact[];
  component?: CdxComponent;
  manufacture?: CdxOrganizationalEntity;
  manufacturer?: CdxOrganizationalEntity;
  supplier?: CdxOrganizationalEntity;
  licenses?: CdxLicenseChoice[];
  properties?: CdxProperty[];
  lifecycles?: CdxLifecycle[];
}

export interface CdxVulnerability {
  'bom-ref'?: string;
  id?: string;
  ratings?: { severity?: string; score?: number; method?: string }[];
  affects?: { ref?: string }[];
}

export interface CdxDocument {
  $schema?: string;
  bomFormat: string;
  specVersion: string;
  serialNumber?: string;
  version: number;
  metadata?: CdxMetadata;
  components?: CdxComponent[];
  services?: CdxService[];
  externalReferences?: CdxExternalReference[];
  dependencies?: CdxDependency[];
  compositions?: CdxComposition[];
  vulnerabilities?: CdxVulnerability[];
}

// ---- SPDX 2.x ----

export interface SpdxChecksum {
  algorithm: string;
  checksumValue: string;
}

export interface SpdxExternalRef {
  referenceCategory: string;
  referenceType: string;
  referenceLocator: string;
}

export interface SpdxCreationInfo {
  created: string;
  creators: string[];
  licenseListVersion?: string;
}

export interface SpdxPackage {
  SPDXID: string;
  name: string;
  versionInfo?: string;
  downloadLocation: string;
  filesAnalyzed?: boolean;
  packageVerificationCode?: { packageVerificationCodeValue: string };
  checksums?: SpdxChecksum[];
  licenseConcluded?: string;
  licenseDeclared?: string;
  copyrightText?: string;
  supplier?: string;
  externalRefs?: SpdxExternalRef[];
  hasFiles?: string[];
  primaryPackagePurpose?: string; // 2.3+
  releaseDate?: string; // 2.3+
  builtDate?: string; // 2.3+
  validUntilDate?: string; // 2.3+
}

export interface SpdxFile {
  SPDXID: string;
  fileName: string;
  checksums?: SpdxChecksum[];
  licenseConcluded?: string;
}

export interface SpdxRelationship {
  spdxElementId: string;
  relationshipType: string;
  relatedSpdxElement: string;
}

export interface SpdxDocument {
  spdxVersion: string;
  dataLicense: string;
  SPDXID: string;
  name: string;
  documentNamespace: string;
  creationInfo: SpdxCreationInfo;
  documentDescribes?: string[];
  packages?: SpdxPackage[];
  files?: SpdxFile[];
  snippets?: { SPDXID: string; snippetFromFile?: string }[];
  relationships?: SpdxRelationship[];
}

// ---- SPDX 3.x (JSON-LD) ----

export interface Spdx3Element {
  type: string;
  spdxId?: string;
  '@id'?: string; // blank-node id, CreationInfo only
  creationInfo?: string | Record<string, unknown>; // @id link or inline CreationInfo
  name?: string;
  [key: string]: unknown;
}

export interface Spdx3Document {
  '@context': string;
  '@graph': Spdx3Element[];
}

// ---- Diagnostics & reports ----

export type Severity = 'error' | 'warning';

export type DiagnosticCategory = 'dialect' | 'structural' | 'graph';

export type DiagnosticCode =
  | 'UNKNOWN_FORMAT'
  | 'UNSUPPORTED_VERSION'
  | 'VERSION_MISMATCH'
  | 'PARSE_FAILURE'
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_ENUM'
  | 'INVALID_FORMAT'
  | 'INVALID_VALUE'
  | 'SHAPE_MISMATCH'
  | 'NOT_AVAILABLE'
  | 'EXCLUSIVE_CHOICE'
  | 'CYCLIC_REFERENCE'
  | 'RECOMMENDED_FIELD'
  | 'DUPLICATE_REF'
  | 'DANGLING_REF';

export interface Diagnostic {
  severity: Severity;
  category: DiagnosticCategory;
  code: DiagnosticCode;
  path: string; // e.g. components[2].hashes[0].content; empty for the document root
  message: string;
}

export type ValidationOutcome = 'passed' | 'failed';

export interface ValidationReport {
  overall: ValidationOutcome;
  format?: SbomFormat;
  specVersion?: string;
  diagnostics: Diagnostic[];
  summary: {
    errors: number;
    warnings: number;
  };
}

export interface ValidateOptions {
  strictUuid?: boolean; // enforce RFC 4122 version/variant nibbles on serialNumber
  expectedVersion?: string; // declared version must equal this when set
}

export type SbomSerialization = 'json' | 'yaml' | 'tag-value' | 'xml';

export interface CheckOptions extends ValidateOptions {
  verbose?: boolean;
  serialization?: SbomSerialization; // skip extension/content sniffing
  maxParallel?: number; // concurrent file loads in validateFiles (default from env)
}

export interface FileValidationResult {
  filePath: string;
  serialization?: SbomSerialization; // undefined when the file could not be read
  timestamp: string;
  durationMs: number;
  report: ValidationReport;
}
