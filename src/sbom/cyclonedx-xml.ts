// CycloneDX XML -> JSON-shaped document.
// xml2js keeps every child as an array, attributes under `$` and text under `_`; this module
// folds that back into the field names the JSON serialization uses so one validator serves both.

import * as xml2js from 'xml2js';
import { JsonRecord, isRecord } from '../diagnostics';
import { CycloneDxPolicy, getPolicy } from '../policy-registry';

type XmlElement = JsonRecord;

// Element shapes that changed between versions follow the policy of the namespace version.
interface MapContext {
  policy?: CycloneDxPolicy;
}

const NAMESPACE = /^http:\/\/cyclonedx\.org\/schema\/bom\/(\d+\.\d+)$/;

// ---- xml2js node access ----

function childNodes(node: XmlElement, name: string): unknown[] {
  const value = node[name];
  return Array.isArray(value) ? value : [];
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isRecord(value) && typeof value._ === 'string') return value._;
  return undefined;
}

// Elements with neither attributes nor children come back as bare strings.
function asElement(value: unknown): XmlElement | undefined {
  if (isRecord(value)) return value;
  if (typeof value === 'string') return value ? { _: value } : {};
  return undefined;
}

function childElements(node: XmlElement, name: string): XmlElement[] {
  const out: XmlElement[] = [];
  for (const child of childNodes(node, name)) {
    const element = asElement(child);
    if (element) out.push(element);
  }
  return out;
}

function childElement(node: XmlElement, name: string): XmlElement | undefined {
  return childElements(node, name)[0];
}

function childText(node: XmlElement, name: string): string | undefined {
  const [first] = childNodes(node, name);
  return textOf(first);
}

function attr(node: XmlElement, name: string): string | undefined {
  const attrs = node.$;
  if (!isRecord(attrs)) return undefined;
  const value = attrs[name];
  return typeof value === 'string' ? value : undefined;
}

function set(out: JsonRecord, key: string, value: unknown): void {
  if (value !== undefined) out[key] = value;
}

function copyText(node: XmlElement, out: JsonRecord, names: string[]): void {
  for (const name of names) set(out, name, childText(node, name));
}

// Numeric leaves stay text when they do not parse, so the validator can report them.
function numberOrText(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return value;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

function copyAttrs(node: XmlElement, out: JsonRecord, names: string[]): void {
  for (const name of names) set(out, name, attr(node, name));
}

// <wrapper><item/>...</wrapper>; undefined when the wrapper is absent.
function mapList<T>(node: XmlElement, wrapper: string, item: string, map: (el: XmlElement) => T): T[] | undefined {
  const container = childElement(node, wrapper);
  return container ? childElements(container, item).map(map) : undefined;
}

// ---- CycloneDX entities ----

function mapHash(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  set(out, 'alg', attr(el, 'alg'));
  set(out, 'content', textOf(el));
  return out;
}

function mapContact(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  copyText(el, out, ['name', 'email', 'phone']);
  return out;
}

function mapEntity(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  set(out, 'name', childText(el, 'name'));
  const urls = childNodes(el, 'url').map(textOf).filter((u): u is string => u !== undefined);
  if (urls.length) out.url = urls;
  const contacts = childElements(el, 'contact');
  if (contacts.length) out.contact = contacts.map(mapContact);
  return out;
}

function mapLicenses(node: XmlElement): JsonRecord[] | undefined {
  const container = childElement(node, 'licenses');
  if (!container) return undefined;
  const choices: JsonRecord[] = childElements(container, 'license').map(el => {
    const license: JsonRecord = {};
    copyText(el, license, ['id', 'name', 'url']);
    return { license };
  });
  for (const expression of childNodes(container, 'expression')) {
    const text = textOf(expression);
    if (text !== undefined) choices.push({ expression: text });
  }
  return choices;
}

function mapExternalReference(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  set(out, 'type', attr(el, 'type'));
  copyText(el, out, ['url', 'comment']);
  set(out, 'hashes', mapList(el, 'hashes', 'hash', mapHash));
  return out;
}

function mapProperty(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  set(out, 'name', attr(el, 'name'));
  set(out, 'value', textOf(el));
  return out;
}

function mapCommit(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  copyText(el, out, ['uid', 'url', 'message']);
  for (const role of ['author', 'committer']) {
    const action = childElement(el, role);
    if (!action) continue;
    const mapped: JsonRecord = {};
    copyText(action, mapped, ['timestamp', 'name', 'email']);
    out[role] = mapped;
  }
  return out;
}

function mapPedigree(el: XmlElement, ctx: MapContext): JsonRecord {
  const out: JsonRecord = {};
  for (const key of ['ancestors', 'descendants', 'variants']) {
    set(out, key, mapList(el, key, 'component', component => mapComponent(component, ctx)));
  }
  set(out, 'commits', mapList(el, 'commits', 'commit', mapCommit));
  set(out, 'patches', mapList(el, 'patches', 'patch', patch => {
    const mapped: JsonRecord = {};
    set(mapped, 'type', attr(patch, 'type'));
    return mapped;
  }));
  return out;
}

function mapIdentity(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  set(out, 'field', childText(el, 'field'));
  set(out, 'confidence', numberOrText(childText(el, 'confidence')));
  set(out, 'methods', mapList(el, 'methods', 'method', method => {
    const mapped: JsonRecord = {};
    set(mapped, 'technique', childText(method, 'technique'));
    set(mapped, 'confidence', numberOrText(childText(method, 'confidence')));
    set(mapped, 'value', childText(method, 'value'));
    return mapped;
  }));
  return out;
}

function mapEvidence(el: XmlElement, ctx: MapContext): JsonRecord {
  const out: JsonRecord = {};
  const identities = childElements(el, 'identity').map(mapIdentity);
  if (identities.length) {
    const asList = ctx.policy ? ctx.policy.evidenceIdentityShape === 'list' : identities.length > 1;
    out.identity = asList ? identities : identities[0];
  }
  set(out, 'occurrences', mapList(el, 'occurrences', 'occurrence', occurrence => {
    const mapped: JsonRecord = {};
    copyAttrs(occurrence, mapped, ['bom-ref']);
    set(mapped, 'location', childText(occurrence, 'location'));
    return mapped;
  }));
  const callstack = childElement(el, 'callstack');
  if (callstack) {
    const mapped: JsonRecord = {};
    set(mapped, 'frames', mapList(callstack, 'frames', 'frame', frame => {
      const mappedFrame: JsonRecord = {};
      copyText(frame, mappedFrame, ['package', 'module', 'function', 'fullFilename']);
      set(mappedFrame, 'line', numberOrText(childText(frame, 'line')));
      set(mappedFrame, 'column', numberOrText(childText(frame, 'column')));
      return mappedFrame;
    }));
    out.callstack = mapped;
  }
  set(out, 'licenses', mapLicenses(el));
  const copyright = childElement(el, 'copyright');
  if (copyright) {
    out.copyright = childNodes(copyright, 'text').map(textOf).filter((t): t is string => t !== undefined).map(text => ({ text }));
  }
  return out;
}

function mapSupplier(el: XmlElement, ctx: MapContext): unknown {
  if (ctx.policy?.supplierShape === 'string') {
    const name = childText(el, 'name') ?? textOf(el);
    if (name !== undefined) return name;
  }
  return mapEntity(el);
}

function mapComponent(el: XmlElement, ctx: MapContext): JsonRecord {
  const out: JsonRecord = {};
  copyAttrs(el, out, ['type', 'bom-ref', 'mime-type']);
  const supplier = childElement(el, 'supplier');
  if (supplier) out.supplier = mapSupplier(supplier, ctx);
  copyText(el, out, ['author', 'publisher', 'group', 'name', 'version', 'description', 'scope', 'copyright', 'cpe', 'purl']);
  set(out, 'hashes', mapList(el, 'hashes', 'hash', mapHash));
  set(out, 'licenses', mapLicenses(el));
  const swid = childElement(el, 'swid');
  if (swid) {
    const mapped: JsonRecord = {};
    copyAttrs(swid, mapped, ['tagId', 'name', 'version']);
    out.swid = mapped;
  }
  const pedigree = childElement(el, 'pedigree');
  if (pedigree) out.pedigree = mapPedigree(pedigree, ctx);
  const evidence = childElement(el, 'evidence');
  if (evidence) out.evidence = mapEvidence(evidence, ctx);
  set(out, 'externalReferences', mapList(el, 'externalReferences', 'reference', mapExternalReference));
  set(out, 'properties', mapList(el, 'properties', 'property', mapProperty));
  set(out, 'components', mapList(el, 'components', 'component', component => mapComponent(component, ctx)));
  return out;
}

function mapService(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  copyAttrs(el, out, ['bom-ref']);
  const provider = childElement(el, 'provider');
  if (provider) out.provider = mapEntity(provider);
  copyText(el, out, ['group', 'name', 'version', 'description']);
  const endpoints = childElement(el, 'endpoints');
  if (endpoints) out.endpoints = childNodes(endpoints, 'endpoint').map(textOf).filter((e): e is string => e !== undefined);
  set(out, 'data', mapList(el, 'data', 'classification', classification => {
    const mapped: JsonRecord = {};
    set(mapped, 'flow', attr(classification, 'flow'));
    set(mapped, 'classification', textOf(classification) ?? '');
    return mapped;
  }));
  set(out, 'licenses', mapLicenses(el));
  set(out, 'externalReferences', mapList(el, 'externalReferences', 'reference', mapExternalReference));
  set(out, 'properties', mapList(el, 'properties', 'property', mapProperty));
  set(out, 'services', mapList(el, 'services', 'service', mapService));
  return out;
}

function mapTools(el: XmlElement, ctx: MapContext): unknown {
  if (childElement(el, 'components') || childElement(el, 'services')) {
    const wrapper: JsonRecord = {};
    set(wrapper, 'components', mapList(el, 'components', 'component', component => mapComponent(component, ctx)));
    set(wrapper, 'services', mapList(el, 'services', 'service', mapService));
    return wrapper;
  }
  return childElements(el, 'tool').map(tool => {
    const mapped: JsonRecord = {};
    copyText(tool, mapped, ['vendor', 'name', 'version']);
    set(mapped, 'hashes', mapList(tool, 'hashes', 'hash', mapHash));
    return mapped;
  });
}

function mapMetadata(el: XmlElement, ctx: MapContext): JsonRecord {
  const out: JsonRecord = {};
  set(out, 'timestamp', childText(el, 'timestamp'));
  set(out, 'lifecycles', mapList(el, 'lifecycles', 'lifecycle', lifecycle => {
    const mapped: JsonRecord = {};
    copyText(lifecycle, mapped, ['phase', 'name', 'description']);
    return mapped;
  }));
  const tools = childElement(el, 'tools');
  if (tools) out.tools = mapTools(tools, ctx);
  set(out, 'authors', mapList(el, 'authors', 'author', mapContact));
  const component = childElement(el, 'component');
  if (component) out.component = mapComponent(component, ctx);
  for (const key of ['manufacture', 'manufacturer', 'supplier']) {
    const entity = childElement(el, key);
    if (entity) out[key] = mapEntity(entity);
  }
  set(out, 'licenses', mapLicenses(el));
  set(out, 'properties', mapList(el, 'properties', 'property', mapProperty));
  return out;
}

function refsOf(el: XmlElement, wrapper: string, item: string): string[] | undefined {
  return mapList(el, wrapper, item, ref => attr(ref, 'ref'))?.filter((r): r is string => r !== undefined);
}

function mapVulnerability(el: XmlElement): JsonRecord {
  const out: JsonRecord = {};
  copyAttrs(el, out, ['bom-ref']);
  copyText(el, out, ['id', 'description']);
  set(out, 'ratings', mapList(el, 'ratings', 'rating', rating => {
    const mapped: JsonRecord = {};
    copyText(rating, mapped, ['severity', 'method']);
    return mapped;
  }));
  set(out, 'affects', mapList(el, 'affects', 'target', target => {
    const mapped: JsonRecord = {};
    set(mapped, 'ref', childText(target, 'ref'));
    return mapped;
  }));
  return out;
}

export function mapCycloneDxXml(root: XmlElement): JsonRecord {
  const doc: JsonRecord = { bomFormat: 'CycloneDX' };
  const ctx: MapContext = {};
  const namespace = attr(root, 'xmlns');
  const match = namespace ? NAMESPACE.exec(namespace) : null;
  if (match) {
    const specVersion = match[1];
    const policy = getPolicy('CycloneDX', specVersion);
    if (policy?.format === 'CycloneDX') {
      ctx.policy = policy;
      // The namespace is the XML form of the schema declaration.
      if (policy.schemaUriValue) doc.$schema = policy.schemaUriValue;
    }
    doc.specVersion = specVersion;
  }
  set(doc, 'serialNumber', attr(root, 'serialNumber'));
  const version = attr(root, 'version');
  if (version !== undefined) doc.version = /^\d+$/.test(version) ? Number(version) : version;

  const metadata = childElement(root, 'metadata');
  if (metadata) doc.metadata = mapMetadata(metadata, ctx);
  set(doc, 'components', mapList(root, 'components', 'component', component => mapComponent(component, ctx)));
  set(doc, 'services', mapList(root, 'services', 'service', mapService));
  set(doc, 'externalReferences', mapList(root, 'externalReferences', 'reference', mapExternalReference));
  set(doc, 'dependencies', mapList(root, 'dependencies', 'dependency', dependency => {
    const mapped: JsonRecord = {};
    set(mapped, 'ref', attr(dependency, 'ref'));
    const dependsOn = childElements(dependency, 'dependency').map(d => attr(d, 'ref')).filter((r): r is string => r !== undefined);
    if (dependsOn.length) mapped.dependsOn = dependsOn;
    return mapped;
  }));
  set(doc, 'compositions', mapList(root, 'compositions', 'composition', composition => {
    const mapped: JsonRecord = {};
    set(mapped, 'aggregate', childText(composition, 'aggregate'));
    set(mapped, 'assemblies', refsOf(composition, 'assemblies', 'assembly'));
    set(mapped, 'dependencies', refsOf(composition, 'dependencies', 'dependency'));
    return mapped;
  }));
  set(doc, 'vulnerabilities', mapList(root, 'vulnerabilities', 'vulnerability', mapVulnerability));
  return doc;
}

export async function parseCycloneDxXml(text: string): Promise<JsonRecord> {
  const parsed: unknown = await xml2js.parseStringPromise(text, { explicitArray: true, trim: true });
  const root = isRecord(parsed) ? asElement(parsed.bom) : undefined;
  if (!root) throw new Error('XML document root is not a CycloneDX <bom> element');
  return mapCycloneDxXml(root);
}
