// CycloneDX structural validator.
// Components, services and pedigree entries nest without bound, so the walk keeps its own
// stack instead of recursing; the same object reached twice is reported as a cycle.

import {
  COMPONENT_SCOPES,
  COMPOSITION_AGGREGATES,
  DATA_FLOWS,
  EXTERNAL_REFERENCE_TYPES,
  LIFECYCLE_PHASES,
  PATCH_TYPES,
  STRICT_UUID_DEFAULT,
  VULNERABILITY_SEVERITIES
} from '../constants';
import { DiagnosticSink, JsonRecord, hasField, isRecord } from '../diagnostics';
import { describeValue, fieldPath, indexPath } from '../format';
import {
  GrammarResult,
  checkCpe,
  checkEmail,
  checkHashAlgorithm,
  checkHashContent,
  checkMime,
  checkPurl,
  checkSpdxExpression,
  checkTimestamp,
  checkUrl,
  checkUuid
} from '../grammar';
import { CycloneDxPolicy } from '../policy-registry';
import { ValidateOptions } from '../types';

type WorkItem =
  | { kind: 'component'; node: unknown; path: string; subject: boolean }
  | { kind: 'service'; node: unknown; path: string };

export class CycloneDxValidator {
  private readonly visited = new WeakSet<object>();
  private readonly label: string;
  private readonly strictUuid: boolean;

  constructor(
    private readonly policy: CycloneDxPolicy,
    private readonly sink: DiagnosticSink,
    options: ValidateOptions = {}
  ) {
    this.label = `CycloneDX ${policy.version}`;
    this.strictUuid = options.strictUuid ?? STRICT_UUID_DEFAULT;
  }

  validate(doc: JsonRecord): void {
    this.checkDocument(doc);
    const metadata = this.sink.optionalRecord(doc, 'metadata', '');
    if (metadata) this.checkMetadata(metadata);
    this.walk(this.childItems(doc, 'components', '', 'component'));
    this.walk(this.childItems(doc, 'services', '', 'service'));
    this.sink.eachRecord(doc, 'externalReferences', '', (ref, path) => this.checkExternalReference(ref, path));
    this.checkDependencies(doc);
    this.checkCompositions(doc);
    this.checkVulnerabilities(doc);
  }

  // ---- document level ----

  private checkDocument(doc: JsonRecord): void {
    const { sink } = this;
    const bomFormat = sink.requireString(doc, 'bomFormat', '');
    if (bomFormat !== undefined && bomFormat !== 'CycloneDX') {
      sink.error('INVALID_VALUE', 'bomFormat', `bomFormat must be 'CycloneDX', found '${bomFormat}'`);
    }

    const version = doc.version;
    if (!hasField(doc, 'version')) {
      sink.error('MISSING_FIELD', 'version', "missing required field 'version'");
    } else if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
      sink.error('INVALID_VALUE', 'version', `BOM version must be an integer >= 1, found ${JSON.stringify(version)}`);
    }

    this.checkSchemaUri(doc);

    if (hasField(doc, 'serialNumber')) {
      const serial = sink.asString(doc.serialNumber, 'serialNumber');
      if (serial !== undefined) sink.grammar(checkUuid(serial, this.strictUuid), 'serialNumber');
    } else {
      sink.warning('RECOMMENDED_FIELD', 'serialNumber', 'serialNumber is recommended so other BOMs can reference this one');
    }
  }

  private checkSchemaUri(doc: JsonRecord): void {
    const { sink, policy, label } = this;
    const present = hasField(doc, '$schema');
    if (!policy.schemaUriRequired) {
      if (present) sink.error('NOT_AVAILABLE', '$schema', `'$schema' must not be present in ${label}`);
      return;
    }
    if (!present) {
      sink.error('MISSING_FIELD', '$schema', `missing required field '$schema' (required in ${label})`);
      return;
    }
    const value = sink.asString(doc.$schema, '$schema');
    if (value !== undefined && value !== policy.schemaUriValue) {
      sink.error('INVALID_VALUE', '$schema', `'$schema' must be '${policy.schemaUriValue}' for ${label}, found '${value}'`);
    }
  }

  // ---- metadata ----

  private checkMetadata(meta: JsonRecord): void {
    const { sink } = this;
    const base = 'metadata';
    const timestamp = sink.optionalString(meta, 'timestamp', base);
    if (timestamp !== undefined) sink.grammar(checkTimestamp(timestamp), 'metadata.timestamp');

    if (hasField(meta, 'tools')) this.checkTools(meta.tools, 'metadata.tools');
    sink.eachRecord(meta, 'authors', base, (author, path) => this.checkContact(author, path));
    for (const key of ['manufacture', 'manufacturer', 'supplier']) {
      const entity = sink.optionalRecord(meta, key, base);
      if (entity) this.checkOrganizationalEntity(entity, fieldPath(base, key));
    }
    if (hasField(meta, 'component')) {
      this.walk([{ kind: 'component', node: meta.component, path: 'metadata.component', subject: true }]);
    }
    sink.eachRecord(meta, 'licenses', base, (choice, path) => this.checkLicenseChoice(choice, path));
    this.checkProperties(meta, base);
    if (hasField(meta, 'lifecycles')) this.checkLifecycles(meta);
  }

  private checkTools(value: unknown, path: string): void {
    const { sink, label } = this;
    if (this.policy.toolsShape === 'components-wrapper') {
      if (!isRecord(value)) {
        sink.error('SHAPE_MISMATCH', path, `tools must be an object with 'components' and/or 'services' in ${label}, found ${describeValue(value)}`);
        return;
      }
      if (!hasField(value, 'components') && !hasField(value, 'services')) {
        sink.error('SHAPE_MISMATCH', path, `tools object carries neither 'components' nor 'services'`);
        return;
      }
      this.walk(this.childItems(value, 'components', path, 'component'));
      this.walk(this.childItems(value, 'services', path, 'service'));
      return;
    }

    if (!Array.isArray(value)) {
      sink.error('SHAPE_MISMATCH', path, `tools must be a list of tool entries in ${label}, found ${describeValue(value)}`);
      return;
    }
    value.forEach((entry, i) => {
      const toolPath = indexPath(path, i);
      const tool = sink.asRecord(entry, toolPath);
      if (!tool) return;
      for (const key of ['vendor', 'name', 'version']) sink.requireString(tool, key, toolPath);
      sink.eachRecord(tool, 'hashes', toolPath, (hash, hashPath) => this.checkHash(hash, hashPath));
    });
  }

  private checkLifecycles(meta: JsonRecord): void {
    const { sink } = this;
    if (!this.policy.lifecyclesAllowed) {
      sink.error('NOT_AVAILABLE', 'metadata.lifecycles', `'lifecycles' is not available in ${this.label}`);
      return;
    }
    sink.eachRecord(meta, 'lifecycles', 'metadata', (lifecycle, path) => {
      const phase = sink.optionalString(lifecycle, 'phase', path);
      if (phase !== undefined) {
        sink.oneOf(phase, LIFECYCLE_PHASES, fieldPath(path, 'phase'), 'lifecycle phase');
      } else if (!hasField(lifecycle, 'phase') && !hasField(lifecycle, 'name')) {
        sink.error('MISSING_FIELD', fieldPath(path, 'phase'), "lifecycle must carry a 'phase' or a custom 'name'");
      }
    });
  }

  // ---- components and services ----

  private childItems(record: JsonRecord, key: string, base: string, kind: WorkItem['kind']): WorkItem[] {
    const list = this.sink.optionalArray(record, key, base);
    if (!list) return [];
    const listPath = fieldPath(base, key);
    return list.map((node, i): WorkItem => {
      const path = indexPath(listPath, i);
      return kind === 'component' ? { kind, node, path, subject: false } : { kind, node, path };
    });
  }

  // Pre-order over the worklist; children are pushed reversed so siblings keep document order.
  private walk(roots: WorkItem[]): void {
    const stack = [...roots].reverse();
    let item: WorkItem | undefined;
    while ((item = stack.pop()) !== undefined) {
      const node = this.sink.asRecord(item.node, item.path);
      if (!node) continue;
      if (this.visited.has(node)) {
        this.sink.error('CYCLIC_REFERENCE', item.path, `${item.kind} is already reachable from another place in the document`);
        continue;
      }
      this.visited.add(node);
      const children = item.kind === 'component'
        ? this.checkComponent(node, item.path, item.subject)
        : this.checkService(node, item.path);
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
  }

  private checkComponent(node: JsonRecord, path: string, subject: boolean): WorkItem[] {
    const { sink, policy } = this;
    const type = sink.requireString(node, 'type', path);
    if (type !== undefined) sink.oneOf(type, policy.componentTypes, fieldPath(path, 'type'), 'component type');
    sink.requireString(node, 'name', path);
    this.checkComponentVersion(node, path, subject);
    sink.optionalString(node, 'bom-ref', path);
    this.checkSupplier(node, path);

    const scope = sink.optionalString(node, 'scope', path);
    if (scope !== undefined) sink.oneOf(scope, COMPONENT_SCOPES, fieldPath(path, 'scope'), 'component scope');

    sink.eachRecord(node, 'hashes', path, (hash, hashPath) => this.checkHash(hash, hashPath));
    sink.eachRecord(node, 'licenses', path, (choice, choicePath) => this.checkLicenseChoice(choice, choicePath));
    this.checkGrammarField(node, 'purl', path, checkPurl);
    this.checkGrammarField(node, 'cpe', path, checkCpe);
    this.checkGrammarField(node, 'mime-type', path, checkMime);

    const swid = sink.optionalRecord(node, 'swid', path);
    if (swid) {
      sink.requireString(swid, 'tagId', fieldPath(path, 'swid'));
      sink.requireString(swid, 'name', fieldPath(path, 'swid'));
    }

    sink.eachRecord(node, 'externalReferences', path, (ref, refPath) => this.checkExternalReference(ref, refPath));
    if (hasField(node, 'evidence')) this.checkEvidence(node.evidence, fieldPath(path, 'evidence'));
    this.checkProperties(node, path);

    const children = this.childItems(node, 'components', path, 'component');
    const pedigree = sink.optionalRecord(node, 'pedigree', path);
    if (pedigree) children.push(...this.checkPedigree(pedigree, fieldPath(path, 'pedigree')));
    return children;
  }

  private checkComponentVersion(node: JsonRecord, path: string, subject: boolean): void {
    const versionPath = fieldPath(path, 'version');
    if (hasField(node, 'version')) {
      this.sink.asString(node.version, versionPath);
      return;
    }
    if (!this.policy.componentVersionRequired) return;
    const ref = node['bom-ref'];
    const name = typeof ref === 'string' ? ref : typeof node.name === 'string' ? node.name : path;
    if (subject) {
      this.sink.warning('RECOMMENDED_FIELD', versionPath, `subject component '${name}' has no 'version'`);
    } else {
      this.sink.error('MISSING_FIELD', versionPath, `component '${name}' is missing required field 'version' (required in ${this.label})`);
    }
  }

  private checkSupplier(node: JsonRecord, path: string): void {
    if (!hasField(node, 'supplier')) return;
    const { sink, label } = this;
    const value = node.supplier;
    const supplierPath = fieldPath(path, 'supplier');
    if (this.policy.supplierShape === 'string') {
      if (typeof value !== 'string') {
        sink.error('SHAPE_MISMATCH', supplierPath, `supplier must be a string in ${label}, found ${describeValue(value)}`);
      }
      return;
    }
    if (!isRecord(value)) {
      sink.error('SHAPE_MISMATCH', supplierPath, `supplier must be an organizational entity in ${label}, found ${describeValue(value)}`);
      return;
    }
    this.checkOrganizationalEntity(value, supplierPath);
  }

  private checkPedigree(pedigree: JsonRecord, path: string): WorkItem[] {
    const { sink } = this;
    sink.eachRecord(pedigree, 'commits', path, (commit, commitPath) => {
      sink.requireString(commit, 'uid', commitPath);
      for (const role of ['author', 'committer']) {
        const action = sink.optionalRecord(commit, role, commitPath);
        if (!action) continue;
        const actionPath = fieldPath(commitPath, role);
        const timestamp = sink.optionalString(action, 'timestamp', actionPath);
        if (timestamp !== undefined) sink.grammar(checkTimestamp(timestamp), fieldPath(actionPath, 'timestamp'));
        const email = sink.optionalString(action, 'email', actionPath);
        if (email !== undefined) sink.grammar(checkEmail(email), fieldPath(actionPath, 'email'));
      }
      const url = sink.optionalString(commit, 'url', commitPath);
      if (url !== undefined) sink.grammar(checkUrl(url), fieldPath(commitPath, 'url'));
    });
    sink.eachRecord(pedigree, 'patches', path, (patch, patchPath) => {
      const type = sink.requireString(patch, 'type', patchPath);
      if (type !== undefined) sink.oneOf(type, PATCH_TYPES, fieldPath(patchPath, 'type'), 'patch type');
    });
    return [
      ...this.childItems(pedigree, 'ancestors', path, 'component'),
      ...this.childItems(pedigree, 'descendants', path, 'component'),
      ...this.childItems(pedigree, 'variants', path, 'component')
    ];
  }

  private checkService(node: JsonRecord, path: string): WorkItem[] {
    const { sink } = this;
    sink.requireString(node, 'name', path);
    sink.optionalString(node, 'bom-ref', path);

    for (const endpoint of sink.stringList(node, 'endpoints', path)) {
      sink.grammar(checkUrl(endpoint.value), endpoint.path);
    }

    sink.eachRecord(node, 'data', path, (data, dataPath) => {
      const flow = sink.requireString(data, 'flow', dataPath);
      if (flow !== undefined) sink.oneOf(flow, DATA_FLOWS, fieldPath(dataPath, 'flow'), 'data flow');
      const classification = sink.requireString(data, 'classification', dataPath);
      if (classification !== undefined && classification.trim() === '') {
        sink.error('INVALID_VALUE', fieldPath(dataPath, 'classification'), 'data classification must not be empty');
      }
    });

    const provider = sink.optionalRecord(node, 'provider', path);
    if (provider) this.checkOrganizationalEntity(provider, fieldPath(path, 'provider'));
    sink.eachRecord(node, 'licenses', path, (choice, choicePath) => this.checkLicenseChoice(choice, choicePath));
    sink.eachRecord(node, 'externalReferences', path, (ref, refPath) => this.checkExternalReference(ref, refPath));
    this.checkProperties(node, path);

    return this.childItems(node, 'services', path, 'service');
  }

  // ---- evidence ----

  private checkEvidence(value: unknown, path: string): void {
    const { sink, policy } = this;
    if (!policy.evidenceAllowed) {
      sink.error('NOT_AVAILABLE', path, `'evidence' is not available in ${this.label}`);
      return;
    }
    const evidence = sink.asRecord(value, path);
    if (!evidence) return;

    if (hasField(evidence, 'identity')) this.checkEvidenceIdentity(evidence.identity, fieldPath(path, 'identity'));
    sink.eachRecord(evidence, 'occurrences', path, (occurrence, occurrencePath) => {
      sink.requireString(occurrence, 'location', occurrencePath);
    });
    const callstack = sink.optionalRecord(evidence, 'callstack', path);
    if (callstack) {
      sink.eachRecord(callstack, 'frames', fieldPath(path, 'callstack'), (frame, framePath) => {
        if (policy.evidenceCallstackRequiresModule) sink.requireString(frame, 'module', framePath, `required in ${this.label}`);
        else sink.optionalString(frame, 'module', framePath);
      });
    }
    sink.eachRecord(evidence, 'licenses', path, (choice, choicePath) => this.checkLicenseChoice(choice, choicePath));
  }

  private checkEvidenceIdentity(value: unknown, path: string): void {
    const { sink, label } = this;
    if (this.policy.evidenceIdentityShape === 'list') {
      if (!Array.isArray(value)) {
        sink.error('SHAPE_MISMATCH', path, `evidence identity must be a list in ${label}, found ${describeValue(value)}`);
        return;
      }
      value.forEach((entry, i) => {
        const entryPath = indexPath(path, i);
        const identity = sink.asRecord(entry, entryPath);
        if (identity) this.checkIdentityEntry(identity, entryPath);
      });
      return;
    }
    if (!isRecord(value)) {
      sink.error('SHAPE_MISMATCH', path, `evidence identity must be an object in ${label}, found ${describeValue(value)}`);
      return;
    }
    this.checkIdentityEntry(value, path);
  }

  private checkIdentityEntry(identity: JsonRecord, path: string): void {
    const field = this.sink.requireString(identity, 'field', path);
    if (field !== undefined) this.sink.oneOf(field, this.policy.evidenceIdentityFields, fieldPath(path, 'field'), 'identity field');
    this.checkConfidence(identity, path);
    this.sink.eachRecord(identity, 'methods', path, (method, methodPath) => {
      this.sink.requireString(method, 'technique', methodPath);
      this.checkConfidence(method, methodPath);
    });
  }

  private checkConfidence(record: JsonRecord, base: string): void {
    if (!hasField(record, 'confidence')) return;
    const confidence = record.confidence;
    if (typeof confidence !== 'number' || confidence < 0 || confidence > 1) {
      this.sink.error('INVALID_VALUE', fieldPath(base, 'confidence'), `confidence must be a number between 0 and 1, found ${JSON.stringify(confidence)}`);
    }
  }

  // ---- shared building blocks ----

  private checkHash(hash: JsonRecord, path: string): void {
    const { sink } = this;
    const alg = sink.requireString(hash, 'alg', path);
    const content = sink.requireString(hash, 'content', path);
    if (alg === undefined) return;
    if (!sink.grammar(checkHashAlgorithm(alg), fieldPath(path, 'alg'), 'INVALID_ENUM')) return;
    if (content !== undefined) sink.grammar(checkHashContent(alg, content), fieldPath(path, 'content'));
  }

  private checkLicenseChoice(choice: JsonRecord, path: string): void {
    const { sink } = this;
    const hasLicense = hasField(choice, 'license');
    const hasExpression = hasField(choice, 'expression');
    if (hasLicense && hasExpression) {
      sink.error('EXCLUSIVE_CHOICE', path, "license choice carries both 'license' and 'expression'");
    } else if (!hasLicense && !hasExpression) {
      sink.error('EXCLUSIVE_CHOICE', path, "license choice needs either 'license' or 'expression'");
    }

    const license = sink.optionalRecord(choice, 'license', path);
    if (license) {
      const licensePath = fieldPath(path, 'license');
      if (!hasField(license, 'id') && !hasField(license, 'name')) {
        sink.error('MISSING_FIELD', licensePath, "license needs either 'id' or 'name'");
      }
      sink.optionalString(license, 'id', licensePath);
      sink.optionalString(license, 'name', licensePath);
      const url = sink.optionalString(license, 'url', licensePath);
      if (url !== undefined) sink.grammar(checkUrl(url), fieldPath(licensePath, 'url'));
    }

    const expression = sink.optionalString(choice, 'expression', path);
    if (expression !== undefined) sink.grammar(checkSpdxExpression(expression), fieldPath(path, 'expression'));
  }

  private checkOrganizationalEntity(entity: JsonRecord, path: string): void {
    const { sink } = this;
    sink.requireString(entity, 'name', path);
    if (hasField(entity, 'url')) {
      const urls = entity.url;
      const urlPath = fieldPath(path, 'url');
      if (!Array.isArray(urls)) {
        sink.error('SHAPE_MISMATCH', urlPath, `'url' must be a list of URLs, found ${describeValue(urls)}`);
      } else {
        for (const url of sink.stringList(entity, 'url', path)) sink.grammar(checkUrl(url.value), url.path);
      }
    }
    sink.eachRecord(entity, 'contact', path, (contact, contactPath) => this.checkContact(contact, contactPath));
  }

  private checkContact(contact: JsonRecord, path: string): void {
    const email = this.sink.optionalString(contact, 'email', path);
    if (email !== undefined) this.sink.grammar(checkEmail(email), fieldPath(path, 'email'));
  }

  private checkExternalReference(ref: JsonRecord, path: string): void {
    const { sink } = this;
    const url = sink.requireString(ref, 'url', path);
    const type = sink.requireString(ref, 'type', path);
    if (url !== undefined) sink.grammar(checkUrl(url), fieldPath(path, 'url'));
    if (type !== undefined) sink.oneOf(type, EXTERNAL_REFERENCE_TYPES, fieldPath(path, 'type'), 'external reference type');
    sink.eachRecord(ref, 'hashes', path, (hash, hashPath) => this.checkHash(hash, hashPath));
  }

  private checkProperties(record: JsonRecord, base: string): void {
    this.sink.eachRecord(record, 'properties', base, (property, path) => {
      this.sink.requireString(property, 'name', path);
      this.sink.requireString(property, 'value', path);
    });
  }

  private checkGrammarField(record: JsonRecord, key: string, base: string, check: (value: string) => GrammarResult): void {
    const value = this.sink.optionalString(record, key, base);
    if (value !== undefined) this.sink.grammar(check(value), fieldPath(base, key));
  }

  // ---- graph sections (shape only; reference resolution lives in the graph validator) ----

  private checkDependencies(doc: JsonRecord): void {
    const { sink } = this;
    sink.eachRecord(doc, 'dependencies', '', (dependency, path) => {
      sink.requireString(dependency, 'ref', path);
      sink.stringList(dependency, 'dependsOn', path);
    });
  }

  private checkCompositions(doc: JsonRecord): void {
    const { sink } = this;
    sink.eachRecord(doc, 'compositions', '', (composition, path) => {
      const aggregate = sink.requireString(composition, 'aggregate', path);
      if (aggregate !== undefined) sink.oneOf(aggregate, COMPOSITION_AGGREGATES, fieldPath(path, 'aggregate'), 'composition aggregate');
      sink.stringList(composition, 'assemblies', path);
      sink.stringList(composition, 'dependencies', path);
    });
  }

  private checkVulnerabilities(doc: JsonRecord): void {
    if (!hasField(doc, 'vulnerabilities')) return;
    const { sink } = this;
    if (!this.policy.vulnerabilitiesAllowed) {
      sink.error('NOT_AVAILABLE', 'vulnerabilities', `'vulnerabilities' is not available in ${this.label}`);
      return;
    }
    sink.eachRecord(doc, 'vulnerabilities', '', (vulnerability, path) => {
      sink.optionalString(vulnerability, 'bom-ref', path);
      sink.optionalString(vulnerability, 'id', path);
      sink.eachRecord(vulnerability, 'ratings', path, (rating, ratingPath) => {
        const severity = sink.optionalString(rating, 'severity', ratingPath);
        if (severity !== undefined) sink.oneOf(severity, VULNERABILITY_SEVERITIES, fieldPath(ratingPath, 'severity'), 'rating severity');
      });
      sink.eachRecord(vulnerability, 'affects', path, (affect, affectPath) => sink.requireString(affect, 'ref', affectPath));
    });
  }
}

export function validateCycloneDx(doc: JsonRecord, policy: CycloneDxPolicy, sink: DiagnosticSink, options: ValidateOptions = {}): void {
  new CycloneDxValidator(policy, sink, options).validate(doc);
}
