// SPDX 3.0.x JSON-LD structural validator: one pass over the flat @graph element list.

import { SPDX3_RELATIONSHIP_TYPES } from '../constants';
import { DiagnosticSink, JsonRecord, hasField, isRecord } from '../diagnostics';
import { describeValue, fieldPath } from '../format';
import { checkPurl, checkSpdx3Hash, checkSpdx3HashAlgorithm, checkTimestamp, checkUrl } from '../grammar';
import { SpdxPolicy } from '../policy-registry';

const NAMED_ELEMENT_TYPES = ['software_Package', 'software_File'];

export class Spdx3Validator {
  private documentCount = 0;

  constructor(private readonly policy: SpdxPolicy, private readonly sink: DiagnosticSink) {}

  validate(doc: JsonRecord): void {
    const { sink, policy } = this;
    const context = sink.requireString(doc, '@context', '');
    if (context !== undefined && context !== policy.contextUri) {
      sink.error('INVALID_VALUE', '@context', `'@context' must be '${policy.contextUri}', found '${context}'`);
    }

    if (!hasField(doc, '@graph')) {
      sink.error('MISSING_FIELD', '@graph', "missing required field '@graph'");
      return;
    }
    if (!Array.isArray(doc['@graph'])) {
      sink.error('SHAPE_MISMATCH', '@graph', `'@graph' must be a list of elements, found ${describeValue(doc['@graph'])}`);
      return;
    }

    this.documentCount = 0;
    sink.eachRecord(doc, '@graph', '', (element, path) => this.checkElement(element, path));
    if (this.documentCount !== 1) {
      sink.error('INVALID_VALUE', '@graph', `expected exactly one SpdxDocument element, found ${this.documentCount}`);
    }
  }

  private checkElement(element: JsonRecord, path: string): void {
    const { sink } = this;
    const type = sink.requireString(element, 'type', path);
    if (type === undefined) return;

    if (type === 'CreationInfo') {
      sink.requireString(element, '@id', path);
      this.checkCreationInfo(element, path);
      return;
    }

    sink.requireString(element, 'spdxId', path);
    this.checkCreationInfoLink(element, path);

    if (NAMED_ELEMENT_TYPES.includes(type)) sink.requireString(element, 'name', path);

    switch (type) {
      case 'SpdxDocument':
        this.documentCount++;
        sink.stringList(element, 'rootElement', path);
        sink.stringList(element, 'element', path);
        sink.eachRecord(element, 'import', path, (imported, importPath) => sink.requireString(imported, 'externalSpdxId', importPath));
        break;
      case 'Relationship':
        this.checkRelationship(element, path);
        break;
      case 'software_Package':
        this.checkPackage(element, path);
        break;
    }

    sink.eachRecord(element, 'verifiedUsing', path, (method, methodPath) => this.checkIntegrityMethod(method, methodPath));
  }

  private checkCreationInfo(info: JsonRecord, path: string): void {
    const { sink, policy } = this;
    const specVersion = sink.requireString(info, 'specVersion', path);
    if (specVersion !== undefined && specVersion !== policy.version) {
      sink.error('INVALID_VALUE', fieldPath(path, 'specVersion'), `CreationInfo specVersion must be '${policy.version}', found '${specVersion}'`);
    }
    const created = sink.requireString(info, 'created', path);
    if (created !== undefined) sink.grammar(checkTimestamp(created), fieldPath(path, 'created'));

    if (!hasField(info, 'createdBy')) {
      sink.error('MISSING_FIELD', fieldPath(path, 'createdBy'), "missing required field 'createdBy'");
      return;
    }
    sink.stringList(info, 'createdBy', path);
    if (Array.isArray(info.createdBy) && info.createdBy.length === 0) {
      sink.error('INVALID_VALUE', fieldPath(path, 'createdBy'), 'createdBy must name at least one agent');
    }
  }

  // creationInfo is either a link to a CreationInfo @id or an inline CreationInfo object.
  private checkCreationInfoLink(element: JsonRecord, path: string): void {
    const infoPath = fieldPath(path, 'creationInfo');
    if (!hasField(element, 'creationInfo')) {
      this.sink.error('MISSING_FIELD', infoPath, "missing required field 'creationInfo'");
      return;
    }
    const info = element.creationInfo;
    if (typeof info === 'string') return;
    if (isRecord(info)) {
      this.checkCreationInfo(info, infoPath);
      return;
    }
    this.sink.error('INVALID_TYPE', infoPath, `creationInfo must be an id or an object, found ${describeValue(info)}`);
  }

  private checkRelationship(rel: JsonRecord, path: string): void {
    const { sink } = this;
    sink.requireString(rel, 'from', path);
    if (!hasField(rel, 'to')) {
      sink.error('MISSING_FIELD', fieldPath(path, 'to'), "missing required field 'to'");
    } else if (Array.isArray(rel.to) && rel.to.length === 0) {
      sink.error('INVALID_VALUE', fieldPath(path, 'to'), "'to' must list at least one element");
    } else {
      sink.stringList(rel, 'to', path);
    }
    const type = sink.requireString(rel, 'relationshipType', path);
    if (type !== undefined) sink.oneOf(type, SPDX3_RELATIONSHIP_TYPES, fieldPath(path, 'relationshipType'), 'relationship type');
  }

  private checkPackage(pkg: JsonRecord, path: string): void {
    const { sink } = this;
    const purl = sink.optionalString(pkg, 'software_packageUrl', path);
    if (purl !== undefined) sink.grammar(checkPurl(purl), fieldPath(path, 'software_packageUrl'));
    const location = sink.optionalString(pkg, 'software_downloadLocation', path);
    if (location !== undefined) sink.grammar(checkUrl(location), fieldPath(path, 'software_downloadLocation'));
  }

  private checkIntegrityMethod(method: JsonRecord, path: string): void {
    const { sink } = this;
    if (method.type !== 'Hash') return;
    const alg = sink.requireString(method, 'algorithm', path);
    const value = sink.requireString(method, 'hashValue', path);
    if (alg === undefined) return;
    if (!sink.grammar(checkSpdx3HashAlgorithm(alg), fieldPath(path, 'algorithm'), 'INVALID_ENUM')) return;
    if (value !== undefined) sink.grammar(checkSpdx3Hash(alg, value), fieldPath(path, 'hashValue'));
  }
}

export function validateSpdx3(doc: JsonRecord, policy: SpdxPolicy, sink: DiagnosticSink): void {
  new Spdx3Validator(policy, sink).validate(doc);
}
