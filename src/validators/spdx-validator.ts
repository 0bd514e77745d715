// SPDX 2.x (JSON shape) structural validator.
// Tag-value documents reach this validator after the loader maps them onto the same shape.

import {
  SPDX_CREATOR_PREFIXES,
  SPDX_DOCUMENT_ID,
  SPDX_EXTERNAL_REF_CATEGORIES,
  SPDX_NO_VALUE,
  SPDX_PACKAGE_PURPOSES,
  SPDX2_RELATIONSHIP_TYPES
} from '../constants';
import { DiagnosticSink, JsonRecord, hasField } from '../diagnostics';
import { fieldPath } from '../format';
import {
  checkCpe,
  checkPurl,
  checkSpdxChecksum,
  checkSpdxChecksumAlgorithm,
  checkSpdxExpression,
  checkSpdxId,
  checkTimestamp,
  checkUrl
} from '../grammar';
import { SpdxPolicy } from '../policy-registry';

const NO_VALUE: readonly string[] = SPDX_NO_VALUE;
const LICENSE_FIELDS = ['licenseConcluded', 'licenseDeclared'];
const PACKAGE_DATE_FIELDS = ['releaseDate', 'builtDate', 'validUntilDate'];

export class SpdxValidator {
  private readonly label: string;

  constructor(private readonly policy: SpdxPolicy, private readonly sink: DiagnosticSink) {
    this.label = `SPDX ${policy.version}`;
  }

  validate(doc: JsonRecord): void {
    this.checkDocument(doc);
    this.sink.eachRecord(doc, 'packages', '', (pkg, path) => this.checkPackage(pkg, path));
    this.sink.eachRecord(doc, 'files', '', (file, path) => this.checkFile(file, path));
    this.sink.eachRecord(doc, 'snippets', '', (snippet, path) => this.checkSnippet(snippet, path));
    this.sink.eachRecord(doc, 'relationships', '', (rel, path) => this.checkRelationship(rel, path));
  }

  private checkDocument(doc: JsonRecord): void {
    const { sink, policy } = this;
    sink.requireString(doc, 'spdxVersion', '');

    const dataLicense = sink.requireString(doc, 'dataLicense', '');
    if (dataLicense !== undefined && dataLicense !== policy.dataLicense) {
      sink.error('INVALID_VALUE', 'dataLicense', `dataLicense must be '${policy.dataLicense}', found '${dataLicense}'`);
    }

    const id = sink.requireString(doc, 'SPDXID', '');
    if (id !== undefined && id !== SPDX_DOCUMENT_ID) {
      sink.error('INVALID_VALUE', 'SPDXID', `document SPDXID must be '${SPDX_DOCUMENT_ID}', found '${id}'`);
    }

    sink.requireString(doc, 'name', '');

    const namespace = sink.requireString(doc, 'documentNamespace', '');
    if (namespace !== undefined && sink.grammar(checkUrl(namespace), 'documentNamespace') && namespace.includes('#')) {
      sink.error('INVALID_FORMAT', 'documentNamespace', `documentNamespace must not contain '#', found '${namespace}'`);
    }

    if (!hasField(doc, 'creationInfo')) {
      sink.error('MISSING_FIELD', 'creationInfo', "missing required field 'creationInfo'");
    } else {
      const info = sink.asRecord(doc.creationInfo, 'creationInfo');
      if (info) this.checkCreationInfo(info);
    }

    for (const described of sink.stringList(doc, 'documentDescribes', '')) {
      sink.grammar(checkSpdxId(described.value), described.path);
    }
  }

  private checkCreationInfo(info: JsonRecord): void {
    const { sink } = this;
    const created = sink.requireString(info, 'created', 'creationInfo');
    if (created !== undefined) sink.grammar(checkTimestamp(created), 'creationInfo.created');

    if (!hasField(info, 'creators')) {
      sink.error('MISSING_FIELD', 'creationInfo.creators', "missing required field 'creators'");
      return;
    }
    const creators = sink.stringList(info, 'creators', 'creationInfo');
    if (Array.isArray(info.creators) && info.creators.length === 0) {
      sink.error('INVALID_VALUE', 'creationInfo.creators', 'creators must name at least one creator');
    }
    for (const creator of creators) {
      if (!SPDX_CREATOR_PREFIXES.some(prefix => creator.value.startsWith(prefix))) {
        sink.error('INVALID_FORMAT', creator.path, `creator '${creator.value}' must start with one of: ${SPDX_CREATOR_PREFIXES.join(' ')}`);
      }
    }
  }

  private checkPackage(pkg: JsonRecord, path: string): void {
    const { sink, policy, label } = this;
    this.checkElementId(pkg, path);
    sink.requireString(pkg, 'name', path);

    const location = sink.requireString(pkg, 'downloadLocation', path);
    if (location !== undefined && !NO_VALUE.includes(location)) sink.grammar(checkUrl(location), fieldPath(path, 'downloadLocation'));

    sink.eachRecord(pkg, 'checksums', path, (checksum, checksumPath) => this.checkChecksum(checksum, checksumPath));

    for (const key of LICENSE_FIELDS) {
      const value = policy.packageLicenseFieldsRequired
        ? sink.requireString(pkg, key, path, `required in ${label}`)
        : sink.optionalString(pkg, key, path);
      this.checkLicenseValue(value, fieldPath(path, key));
    }
    if (policy.packageLicenseFieldsRequired) sink.requireString(pkg, 'copyrightText', path, `required in ${label}`);
    for (const license of sink.stringList(pkg, 'licenseInfoFromFiles', path)) this.checkLicenseValue(license.value, license.path);

    if (pkg.filesAnalyzed === true && !hasField(pkg, 'packageVerificationCode')) {
      sink.error('MISSING_FIELD', fieldPath(path, 'packageVerificationCode'), "missing required field 'packageVerificationCode' (filesAnalyzed is true)");
    }

    const supplier = sink.optionalString(pkg, 'supplier', path);
    if (supplier !== undefined && supplier !== 'NOASSERTION' && !/^(Person|Organization):/.test(supplier)) {
      sink.error('INVALID_FORMAT', fieldPath(path, 'supplier'), `supplier '${supplier}' must be NOASSERTION or start with 'Person:' or 'Organization:'`);
    }

    sink.eachRecord(pkg, 'externalRefs', path, (ref, refPath) => this.checkExternalRef(ref, refPath));

    if (hasField(pkg, 'primaryPackagePurpose')) {
      const purposePath = fieldPath(path, 'primaryPackagePurpose');
      if (!policy.primaryPackagePurposeAllowed) {
        sink.error('NOT_AVAILABLE', purposePath, `'primaryPackagePurpose' is not available in ${label}`);
      } else {
        const purpose = sink.asString(pkg.primaryPackagePurpose, purposePath);
        if (purpose !== undefined) sink.oneOf(purpose, SPDX_PACKAGE_PURPOSES, purposePath, 'package purpose');
      }
    }

    for (const key of PACKAGE_DATE_FIELDS) {
      if (!hasField(pkg, key)) continue;
      const datePath = fieldPath(path, key);
      if (!policy.packageDatesAllowed) {
        sink.error('NOT_AVAILABLE', datePath, `'${key}' is not available in ${label}`);
        continue;
      }
      const date = sink.asString(pkg[key], datePath);
      if (date !== undefined) sink.grammar(checkTimestamp(date), datePath);
    }

    for (const file of sink.stringList(pkg, 'hasFiles', path)) sink.grammar(checkSpdxId(file.value), file.path);
  }

  private checkFile(file: JsonRecord, path: string): void {
    const { sink } = this;
    this.checkElementId(file, path);
    sink.requireString(file, 'fileName', path);

    if (!hasField(file, 'checksums')) {
      sink.error('MISSING_FIELD', fieldPath(path, 'checksums'), "missing required field 'checksums'");
      return;
    }
    const algorithms: string[] = [];
    sink.eachRecord(file, 'checksums', path, (checksum, checksumPath) => {
      const alg = this.checkChecksum(checksum, checksumPath);
      if (alg !== undefined) algorithms.push(alg);
    });
    if (Array.isArray(file.checksums) && !algorithms.includes('SHA1')) {
      sink.error('MISSING_FIELD', fieldPath(path, 'checksums'), 'file checksums must include a SHA1 entry');
    }
    this.checkLicenseValue(sink.optionalString(file, 'licenseConcluded', path), fieldPath(path, 'licenseConcluded'));
  }

  private checkSnippet(snippet: JsonRecord, path: string): void {
    this.checkElementId(snippet, path);
    this.sink.requireString(snippet, 'snippetFromFile', path);
    this.sink.optionalArray(snippet, 'ranges', path);
  }

  private checkRelationship(rel: JsonRecord, path: string): void {
    const { sink } = this;
    sink.requireString(rel, 'spdxElementId', path);
    sink.requireString(rel, 'relatedSpdxElement', path);
    const type = sink.requireString(rel, 'relationshipType', path);
    if (type !== undefined) sink.oneOf(type, SPDX2_RELATIONSHIP_TYPES, fieldPath(path, 'relationshipType'), 'relationship type');
  }

  private checkElementId(element: JsonRecord, path: string): void {
    const id = this.sink.requireString(element, 'SPDXID', path);
    if (id !== undefined) this.sink.grammar(checkSpdxId(id), fieldPath(path, 'SPDXID'));
  }

  // Returns the algorithm when it is a known one.
  private checkChecksum(checksum: JsonRecord, path: string): string | undefined {
    const { sink } = this;
    const alg = sink.requireString(checksum, 'algorithm', path);
    const value = sink.requireString(checksum, 'checksumValue', path);
    if (alg === undefined) return undefined;
    if (!sink.grammar(checkSpdxChecksumAlgorithm(alg), fieldPath(path, 'algorithm'), 'INVALID_ENUM')) return undefined;
    if (value !== undefined) sink.grammar(checkSpdxChecksum(alg, value), fieldPath(path, 'checksumValue'));
    return alg;
  }

  private checkLicenseValue(value: string | undefined, path: string): void {
    if (value === undefined || NO_VALUE.includes(value)) return;
    this.sink.grammar(checkSpdxExpression(value), path);
  }

  private checkExternalRef(ref: JsonRecord, path: string): void {
    const { sink } = this;
    const category = sink.requireString(ref, 'referenceCategory', path);
    if (category !== undefined) sink.oneOf(category, SPDX_EXTERNAL_REF_CATEGORIES, fieldPath(path, 'referenceCategory'), 'external reference category');
    const type = sink.requireString(ref, 'referenceType', path);
    const locator = sink.requireString(ref, 'referenceLocator', path);
    if (type === undefined || locator === undefined) return;
    const locatorPath = fieldPath(path, 'referenceLocator');
    if (type === 'purl') sink.grammar(checkPurl(locator), locatorPath);
    else if (type === 'cpe22Type' || type === 'cpe23Type') sink.grammar(checkCpe(locator), locatorPath);
  }
}

export function validateSpdx(doc: JsonRecord, policy: SpdxPolicy, sink: DiagnosticSink): void {
  new SpdxValidator(policy, sink).validate(doc);
}
