// Value grammars for SBOM scalar fields (UUID, timestamps, digests, URLs, license expressions).
// Checks never throw: each returns a verdict with a reason so callers can collect every failure.

import { CDX_HASH_LENGTHS, SPDX_CHECKSUM_LENGTHS, SPDX3_HASH_LENGTHS, URL_SCHEMES } from './constants';

export type GrammarResult = { valid: true } | { valid: false; reason: string };

const VALID: GrammarResult = { valid: true };
const invalid = (reason: string): GrammarResult => ({ valid: false, reason });

const hasOwn = (table: object, key: string) => Object.prototype.hasOwnProperty.call(table, key);

const UUID_URN = /^urn:uuid:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
// version nibble 1-8, variant 10xx
const UUID_URN_RFC4122 = /^urn:uuid:[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function checkUuid(value: string, strict = false): GrammarResult {
  if (!UUID_URN.test(value)) return invalid(`'${value}' is not a urn:uuid: identifier in 8-4-4-4-12 hex layout`);
  if (strict && !UUID_URN_RFC4122.test(value)) return invalid(`'${value}' does not carry RFC 4122 version/variant bits`);
  return VALID;
}

const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-](\d{2})(?::?(\d{2}))?)$/;

export function checkTimestamp(value: string): GrammarResult {
  const m = ISO_DATE_TIME.exec(value);
  if (!m) return invalid(`'${value}' is not an ISO-8601 date-time with a Z or ±hh:mm offset`);
  const [year, month, day, hour, minute] = [m[1], m[2], m[3], m[4], m[5]].map(Number);
  const second = m[6] ? Number(m[6]) : 0;
  if (month < 1 || month > 12) return invalid(`'${value}' has month ${month} out of range`);
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) return invalid(`'${value}' has day ${day} out of range for month ${month}`);
  if (hour > 23 || minute > 59 || second > 60) return invalid(`'${value}' has a time of day out of range`);
  const offsetHour = m[7] ? Number(m[7]) : 0;
  const offsetMinute = m[8] ? Number(m[8]) : 0;
  if (offsetHour > 23 || offsetMinute > 59) return invalid(`'${value}' has a timezone offset out of range`);
  return VALID;
}

const HEX = /^[0-9a-fA-F]*$/;

function checkDigest(table: Readonly<Record<string, number | undefined>>, alg: string, content: string): GrammarResult {
  if (!hasOwn(table, alg)) return invalid(`unknown hash algorithm '${alg}'`);
  if (!HEX.test(content)) return invalid(`${alg} content is not hexadecimal`);
  const expected = table[alg];
  if (expected === undefined) {
    if (content.length === 0 || content.length % 2 !== 0) return invalid(`${alg} content must be a non-empty even number of hex digits`);
    return VALID;
  }
  if (content.length !== expected) return invalid(`${alg} content must be ${expected} hex digits, found ${content.length}`);
  return VALID;
}

export function checkHashAlgorithm(alg: string): GrammarResult {
  return hasOwn(CDX_HASH_LENGTHS, alg) ? VALID : invalid(`unknown hash algorithm '${alg}'`);
}

export function checkHashContent(alg: string, content: string): GrammarResult {
  return checkDigest(CDX_HASH_LENGTHS, alg, content);
}

export function checkSpdxChecksumAlgorithm(alg: string): GrammarResult {
  return hasOwn(SPDX_CHECKSUM_LENGTHS, alg) ? VALID : invalid(`unknown checksum algorithm '${alg}'`);
}

export function checkSpdx3HashAlgorithm(alg: string): GrammarResult {
  return hasOwn(SPDX3_HASH_LENGTHS, alg) ? VALID : invalid(`unknown hash algorithm '${alg}'`);
}

export function checkSpdxChecksum(alg: string, value: string): GrammarResult {
  return checkDigest(SPDX_CHECKSUM_LENGTHS, alg, value);
}

export function checkSpdx3Hash(alg: string, value: string): GrammarResult {
  return checkDigest(SPDX3_HASH_LENGTHS, alg, value);
}

const URL_SCHEME_SET: ReadonlySet<string> = new Set(URL_SCHEMES);

export function checkUrl(value: string): GrammarResult {
  const schemeMatch = /^([a-zA-Z][a-zA-Z0-9+.-]*):/.exec(value);
  if (!schemeMatch) return invalid(`'${value}' has no URL scheme`);
  const scheme = schemeMatch[1].toLowerCase();
  if (!URL_SCHEME_SET.has(scheme)) return invalid(`'${value}' uses unrecognized scheme '${scheme}'`);
  if (!value.slice(scheme.length + 1).startsWith('//')) return invalid(`'${value}' has no authority component`);
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return invalid(`'${value}' is not a parseable URL`);
  }
  if (!parsed.hostname) return invalid(`'${value}' has an empty authority component`);
  return VALID;
}

const EMAIL = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export function checkEmail(value: string): GrammarResult {
  return EMAIL.test(value) ? VALID : invalid(`'${value}' is not an email address`);
}

const MIME = /^[-+a-z0-9.]+\/[-+a-z0-9.]+$/;

export function checkMime(value: string): GrammarResult {
  return MIME.test(value) ? VALID : invalid(`'${value}' is not a type/subtype MIME type`);
}

export function checkCpe(value: string): GrammarResult {
  return value.startsWith('cpe:') ? VALID : invalid(`'${value}' does not start with 'cpe:'`);
}

export function checkPurl(value: string): GrammarResult {
  return value.startsWith('pkg:') ? VALID : invalid(`'${value}' does not start with 'pkg:'`);
}

// Heuristic only: a single token, or any text mentioning a compound operator, is accepted.
// Not an SPDX expression grammar.
export function checkSpdxExpression(value: string): GrammarResult {
  if (value.trim().length === 0) return invalid('license expression is empty');
  if (!/\s/.test(value)) return VALID;
  if (['AND', 'OR', 'WITH'].some(op => value.includes(op))) return VALID;
  return invalid(`'${value}' contains whitespace but no AND/OR/WITH operator`);
}

const SPDX_ID = /^SPDXRef-[A-Za-z0-9.\-]+$/;

export function checkSpdxId(value: string): GrammarResult {
  return SPDX_ID.test(value) ? VALID : invalid(`'${value}' is not an SPDXRef-<idstring> identifier`);
}
