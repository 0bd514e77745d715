// SPDX 2.x tag-value reader. Produces the same object shape as SPDX JSON so one validator
// serves both serializations. Section context (document / package / file / snippet) decides
// where an SPDXID or license tag lands.

import { JsonRecord } from '../diagnostics';

export class TagValueParseError extends Error {
  constructor(message: string, public readonly line: number) {
    super(`line ${line}: ${message}`);
    this.name = 'TagValueParseError';
  }
}

type Section = 'document' | 'package' | 'file' | 'snippet';

function append(record: JsonRecord, key: string, value: unknown): void {
  const list = record[key];
  if (Array.isArray(list)) list.push(value);
  else record[key] = [value];
}

// "SHA256: abcd..." -> { algorithm, checksumValue }
function parseChecksum(value: string, line: number): JsonRecord {
  const m = /^([A-Za-z0-9-]+):\s*(\S+)$/.exec(value);
  if (!m) throw new TagValueParseError(`malformed checksum '${value}'`, line);
  return { algorithm: m[1], checksumValue: m[2] };
}

// "<value> (excludes: a, b)"
function parseVerificationCode(value: string): JsonRecord {
  const m = /^(\S+)(?:\s*\(excludes:\s*(.*)\))?$/.exec(value);
  if (!m) return { packageVerificationCodeValue: value };
  const code: JsonRecord = { packageVerificationCodeValue: m[1] };
  if (m[2]) code.packageVerificationCodeExcludedFiles = m[2].split(',').map(s => s.trim()).filter(Boolean);
  return code;
}

const PACKAGE_TAGS: Record<string, string> = {
  PackageVersion: 'versionInfo',
  PackageFileName: 'packageFileName',
  PackageSupplier: 'supplier',
  PackageOriginator: 'originator',
  PackageDownloadLocation: 'downloadLocation',
  PackageHomePage: 'homepage',
  PackageSourceInfo: 'sourceInfo',
  PackageLicenseConcluded: 'licenseConcluded',
  PackageLicenseDeclared: 'licenseDeclared',
  PackageLicenseComments: 'licenseComments',
  PackageCopyrightText: 'copyrightText',
  PackageSummary: 'summary',
  PackageDescription: 'description',
  PackageComment: 'comment',
  PrimaryPackagePurpose: 'primaryPackagePurpose',
  ReleaseDate: 'releaseDate',
  BuiltDate: 'builtDate',
  ValidUntilDate: 'validUntilDate'
};

const FILE_TAGS: Record<string, string> = {
  LicenseConcluded: 'licenseConcluded',
  FileCopyrightText: 'copyrightText',
  FileComment: 'comment',
  FileNotice: 'noticeText'
};

const SNIPPET_TAGS: Record<string, string> = {
  SnippetFromFileSPDXID: 'snippetFromFile',
  SnippetLicenseConcluded: 'licenseConcluded',
  SnippetCopyrightText: 'copyrightText',
  SnippetName: 'name'
};

const DOCUMENT_TAGS: Record<string, string> = {
  SPDXVersion: 'spdxVersion',
  DataLicense: 'dataLicense',
  DocumentName: 'name',
  DocumentNamespace: 'documentNamespace',
  DocumentComment: 'comment'
};

const lookup = (table: Record<string, string>, tag: string) =>
  Object.prototype.hasOwnProperty.call(table, tag) ? table[tag] : undefined;

interface TagLine {
  tag: string;
  value: string;
  line: number;
}

// Split into tag/value pairs, folding <text>...</text> blocks that span lines.
function* readTags(text: string): Generator<TagLine> {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const colon = raw.indexOf(':');
    if (colon <= 0) throw new TagValueParseError(`expected 'Tag: value', found '${trimmed}'`, i + 1);
    const tag = raw.slice(0, colon).trim();
    let value = raw.slice(colon + 1).trim();
    const start = i + 1;
    if (value.startsWith('<text>')) {
      while (!value.includes('</text>')) {
        i++;
        if (i >= lines.length) throw new TagValueParseError(`unterminated <text> block for '${tag}'`, start);
        value += '\n' + lines[i];
      }
      value = value.slice('<text>'.length, value.lastIndexOf('</text>')).trim();
    }
    yield { tag, value, line: start };
  }
}

export function parseTagValue(text: string): JsonRecord {
  const doc: JsonRecord = {};
  const creationInfo: JsonRecord = {};
  let section: Section = 'document';
  let current: JsonRecord = doc;

  for (const { tag, value, line } of readTags(text)) {
    switch (tag) {
      case 'PackageName':
        section = 'package';
        current = { name: value };
        append(doc, 'packages', current);
        continue;
      case 'FileName':
        section = 'file';
        current = { fileName: value };
        append(doc, 'files', current);
        continue;
      case 'SnippetSPDXID':
        section = 'snippet';
        current = { SPDXID: value };
        append(doc, 'snippets', current);
        continue;
      case 'SPDXID':
        current.SPDXID = value;
        continue;
      case 'Creator':
        append(creationInfo, 'creators', value);
        continue;
      case 'Created':
        creationInfo.created = value;
        continue;
      case 'CreatorComment':
        creationInfo.comment = value;
        continue;
      case 'LicenseListVersion':
        creationInfo.licenseListVersion = value;
        continue;
      case 'Relationship': {
        const parts = value.split(/\s+/);
        if (parts.length !== 3) throw new TagValueParseError(`relationship needs 'A TYPE B', found '${value}'`, line);
        append(doc, 'relationships', { spdxElementId: parts[0], relationshipType: parts[1], relatedSpdxElement: parts[2] });
        continue;
      }
      case 'ExternalDocumentRef': {
        const m = /^(\S+)\s+(\S+)\s+(.+)$/.exec(value);
        if (!m) throw new TagValueParseError(`malformed external document ref '${value}'`, line);
        append(doc, 'externalDocumentRefs', { externalDocumentId: m[1], spdxDocument: m[2], checksum: parseChecksum(m[3], line) });
        continue;
      }
    }

    if (section === 'package') {
      if (tag === 'PackageChecksum') append(current, 'checksums', parseChecksum(value, line));
      else if (tag === 'FilesAnalyzed') current.filesAnalyzed = value.toLowerCase() === 'true';
      else if (tag === 'PackageVerificationCode') current.packageVerificationCode = parseVerificationCode(value);
      else if (tag === 'PackageLicenseInfoFromFiles') append(current, 'licenseInfoFromFiles', value);
      else if (tag === 'ExternalRef') {
        const m = /^(\S+)\s+(\S+)\s+(\S+)$/.exec(value);
        if (!m) throw new TagValueParseError(`external ref needs 'CATEGORY TYPE LOCATOR', found '${value}'`, line);
        append(current, 'externalRefs', { referenceCategory: m[1], referenceType: m[2], referenceLocator: m[3] });
      } else {
        const key = lookup(PACKAGE_TAGS, tag);
        if (key) current[key] = value;
      }
      continue;
    }

    if (section === 'file') {
      if (tag === 'FileChecksum') append(current, 'checksums', parseChecksum(value, line));
      else if (tag === 'LicenseInfoInFile') append(current, 'licenseInfoInFiles', value);
      else if (tag === 'FileType') append(current, 'fileTypes', value);
      else {
        const key = lookup(FILE_TAGS, tag);
        if (key) current[key] = value;
      }
      continue;
    }

    if (section === 'snippet') {
      const key = lookup(SNIPPET_TAGS, tag);
      if (key) current[key] = value;
      continue;
    }

    const key = lookup(DOCUMENT_TAGS, tag);
    if (key) doc[key] = value;
  }

  if (Object.keys(creationInfo).length) doc.creationInfo = creationInfo;
  return doc;
}
