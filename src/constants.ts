// Closed value sets and tunables shared by the validators.
// Environment overrides are read once at module load.

import relationshipTypes from './data/spdx-relationship-types.json';

export const TOOL_NAME = 'sbom-conformance-linter';

// CycloneDX hash algorithm -> expected hex digit count
export const CDX_HASH_LENGTHS: Readonly<Record<string, number>> = {
  'MD5': 32,
  'SHA-1': 40,
  'SHA-256': 64,
  'SHA-384': 96,
  'SHA-512': 128,
  'SHA3-256': 64,
  'SHA3-384': 96,
  'SHA3-512': 128,
  'BLAKE2b-256': 64,
  'BLAKE2b-384': 96,
  'BLAKE2b-512': 128,
  'BLAKE3': 64
};

// SPDX checksum algorithm -> expected hex digit count (undefined = variable length)
export const SPDX_CHECKSUM_LENGTHS: Readonly<Record<string, number | undefined>> = {
  'SHA1': 40,
  'SHA224': 56,
  'SHA256': 64,
  'SHA384': 96,
  'SHA512': 128,
  'SHA3-256': 64,
  'SHA3-384': 96,
  'SHA3-512': 128,
  'BLAKE2b-256': 64,
  'BLAKE2b-384': 96,
  'BLAKE2b-512': 128,
  'BLAKE3': 64,
  'MD2': 32,
  'MD4': 32,
  'MD5': 32,
  'MD6': undefined,
  'ADLER32': 8
};

// SPDX 3 Hash.algorithm -> hex digit count
export const SPDX3_HASH_LENGTHS: Readonly<Record<string, number | undefined>> = {
  'md2': 32,
  'md4': 32,
  'md5': 32,
  'md6': undefined,
  'sha1': 40,
  'sha224': 56,
  'sha256': 64,
  'sha384': 96,
  'sha512': 128,
  'sha3_224': 56,
  'sha3_256': 64,
  'sha3_384': 96,
  'sha3_512': 128,
  'blake2b256': 64,
  'blake2b384': 96,
  'blake2b512': 128,
  'blake3': 64,
  'adler32': 8,
  'crystalsKyber': undefined,
  'crystalsDilithium': undefined,
  'falcon': undefined,
  'other': undefined
};

export const CDX_BASE_COMPONENT_TYPES = [
  'application', 'framework', 'library', 'container',
  'operating-system', 'device', 'firmware', 'file'
] as const;

export const COMPONENT_SCOPES = ['required', 'optional', 'excluded'] as const;

export const PATCH_TYPES = ['unofficial', 'monkey', 'backport', 'cherry-pick'] as const;

export const DATA_FLOWS = ['inbound', 'outbound', 'bi-directional', 'unknown'] as const;

export const COMPOSITION_AGGREGATES = [
  'complete', 'incomplete', 'incomplete_first_party_only',
  'incomplete_third_party_only', 'unknown', 'not_specified'
] as const;

export const LIFECYCLE_PHASES = [
  'design', 'pre-build', 'build', 'post-build', 'operations', 'discovery', 'decommission'
] as const;

export const EXTERNAL_REFERENCE_TYPES = [
  'vcs', 'issue-tracker', 'website', 'advisories', 'bom',
  'mailing-list', 'social', 'chat', 'documentation', 'support',
  'distribution', 'license', 'build-meta', 'build-system',
  'release-notes', 'other'
] as const;

export const EVIDENCE_IDENTITY_FIELDS = ['group', 'name', 'version', 'purl', 'cpe', 'swid', 'hash'] as const;
export const EVIDENCE_IDENTITY_FIELDS_16 = [...EVIDENCE_IDENTITY_FIELDS, 'omniborId', 'swhid'] as const;

export const VULNERABILITY_SEVERITIES = ['critical', 'high', 'medium', 'low', 'info', 'none', 'unknown'] as const;

export const URL_SCHEMES = [
  'http', 'https', 'ftp', 'ftps', 'sftp', 'ssh', 'git', 'git+https', 'git+ssh',
  'svn', 'svn+ssh', 'hg', 'ws', 'wss'
] as const;

// ---- SPDX ----

export const SPDX_DOCUMENT_ID = 'SPDXRef-DOCUMENT';
export const SPDX_NO_VALUE = ['NOASSERTION', 'NONE'] as const;
export const SPDX_CREATOR_PREFIXES = ['Tool:', 'Organization:', 'Person:'] as const;

export const SPDX_EXTERNAL_REF_CATEGORIES = [
  'SECURITY', 'PACKAGE-MANAGER', 'PACKAGE_MANAGER', 'PERSISTENT-ID', 'PERSISTENT_ID', 'OTHER'
] as const;

export const SPDX_PACKAGE_PURPOSES = [
  'APPLICATION', 'FRAMEWORK', 'LIBRARY', 'CONTAINER', 'OPERATING-SYSTEM', 'DEVICE',
  'FIRMWARE', 'SOURCE', 'ARCHIVE', 'FILE', 'INSTALL', 'OTHER'
] as const;

export const SPDX2_RELATIONSHIP_TYPES: readonly string[] = relationshipTypes.spdx2;
export const SPDX3_RELATIONSHIP_TYPES: readonly string[] = relationshipTypes.spdx3;

// ---- Environment driven defaults ----

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  const parsed = raw ? parseInt(raw, 10) : NaN;
  if (!isNaN(parsed) && parsed > 0) return parsed;
  return fallback;
}

export const STRICT_UUID_DEFAULT = process.env.SBOMLINT_STRICT_UUID === '1';
export const DEFAULT_MAX_PARALLEL = envInt('SBOMLINT_MAX_PARALLEL', 4);
export const MAX_FILE_BYTES = envInt('SBOMLINT_MAX_FILE_BYTES', 32 * 1024 * 1024); // 32 MiB

export const SEVERITY_EMOJI: Record<'error' | 'warning', string> = {
  error: '🔴',
  warning: '🟡'
};
