// Identifier graph checks: duplicate declarations and references that resolve nowhere.
// Collect-then-check, so a reference may point at an identifier declared later in the document.

import { SPDX_NO_VALUE } from '../constants';
import { DiagnosticSink, JsonRecord, isRecord } from '../diagnostics';
import { fieldPath, indexPath } from '../format';

export type GraphDialect = 'cyclonedx' | 'spdx2' | 'spdx3';

interface Located {
  node: unknown;
  path: string;
}

// List entries under record[key] with their paths; anything that is not a list yields nothing.
function entries(record: JsonRecord, key: string, base: string): Located[] {
  const list = record[key];
  if (!Array.isArray(list)) return [];
  const listPath = fieldPath(base, key);
  return list.map((node, i) => ({ node, path: indexPath(listPath, i) }));
}

export class IdentifierGraph {
  private readonly declared = new Map<string, string>(); // id -> first declaration path
  private readonly references: { id: string; path: string }[] = [];
  private readonly exempt = new Set<string>();

  constructor(private readonly sink: DiagnosticSink) {}

  declare(id: unknown, path: string): void {
    if (typeof id !== 'string') return;
    const first = this.declared.get(id);
    if (first !== undefined) {
      this.sink.error('DUPLICATE_REF', path, `identifier '${id}' is already declared at ${first}`);
      return;
    }
    this.declared.set(id, path);
  }

  reference(id: unknown, path: string): void {
    if (typeof id === 'string') this.references.push({ id, path });
  }

  // Ids defined outside this document.
  allowExternal(id: unknown): void {
    if (typeof id === 'string') this.exempt.add(id);
  }

  resolve(isExternal: (id: string) => boolean = () => false): void {
    for (const { id, path } of this.references) {
      if (this.declared.has(id) || this.exempt.has(id) || isExternal(id)) continue;
      this.sink.error('DANGLING_REF', path, `reference '${id}' is not declared anywhere in the document`);
    }
  }
}

function collectCycloneDx(doc: JsonRecord, graph: IdentifierGraph): void {
  const roots: Located[] = [];
  const metadata = doc.metadata;
  if (isRecord(metadata)) {
    roots.push({ node: metadata.component, path: 'metadata.component' });
    const tools = metadata.tools;
    if (isRecord(tools)) {
      roots.push(...entries(tools, 'components', 'metadata.tools'), ...entries(tools, 'services', 'metadata.tools'));
    }
  }
  roots.push(...entries(doc, 'components', ''), ...entries(doc, 'services', ''));

  const visited = new WeakSet<object>();
  const stack = roots.reverse();
  let item: Located | undefined;
  while ((item = stack.pop()) !== undefined) {
    const { node, path } = item;
    if (!isRecord(node) || visited.has(node)) continue;
    visited.add(node);
    graph.declare(node['bom-ref'], fieldPath(path, 'bom-ref'));

    const children = [...entries(node, 'components', path), ...entries(node, 'services', path)];
    const pedigree = node.pedigree;
    if (isRecord(pedigree)) {
      const pedigreePath = fieldPath(path, 'pedigree');
      for (const key of ['ancestors', 'descendants', 'variants']) children.push(...entries(pedigree, key, pedigreePath));
    }
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }

  const vulnerabilities = entries(doc, 'vulnerabilities', '');
  for (const { node, path } of vulnerabilities) {
    if (isRecord(node)) graph.declare(node['bom-ref'], fieldPath(path, 'bom-ref'));
  }

  for (const { node, path } of entries(doc, 'dependencies', '')) {
    if (!isRecord(node)) continue;
    graph.reference(node.ref, fieldPath(path, 'ref'));
    for (const target of entries(node, 'dependsOn', path)) graph.reference(target.node, target.path);
  }
  for (const { node, path } of entries(doc, 'compositions', '')) {
    if (!isRecord(node)) continue;
    for (const key of ['assemblies', 'dependencies']) {
      for (const target of entries(node, key, path)) graph.reference(target.node, target.path);
    }
  }
  for (const { node, path } of vulnerabilities) {
    if (!isRecord(node)) continue;
    for (const affect of entries(node, 'affects', path)) {
      if (isRecord(affect.node)) graph.reference(affect.node.ref, fieldPath(affect.path, 'ref'));
    }
  }
}

const SPDX_NO_VALUE_SET: ReadonlySet<string> = new Set(SPDX_NO_VALUE);

const isSpdx2External = (id: string) => SPDX_NO_VALUE_SET.has(id) || id.startsWith('DocumentRef-');

function collectSpdx2(doc: JsonRecord, graph: IdentifierGraph): void {
  graph.declare(doc.SPDXID, 'SPDXID');
  const packages = entries(doc, 'packages', '');
  for (const key of ['packages', 'files', 'snippets']) {
    for (const { node, path } of entries(doc, key, '')) {
      if (isRecord(node)) graph.declare(node.SPDXID, fieldPath(path, 'SPDXID'));
    }
  }

  for (const target of entries(doc, 'documentDescribes', '')) graph.reference(target.node, target.path);
  for (const { node, path } of packages) {
    if (!isRecord(node)) continue;
    for (const target of entries(node, 'hasFiles', path)) graph.reference(target.node, target.path);
  }
  for (const { node, path } of entries(doc, 'snippets', '')) {
    if (isRecord(node)) graph.reference(node.snippetFromFile, fieldPath(path, 'snippetFromFile'));
  }
  for (const { node, path } of entries(doc, 'relationships', '')) {
    if (!isRecord(node)) continue;
    graph.reference(node.spdxElementId, fieldPath(path, 'spdxElementId'));
    graph.reference(node.relatedSpdxElement, fieldPath(path, 'relatedSpdxElement'));
  }
}

function collectSpdx3(doc: JsonRecord, graph: IdentifierGraph): void {
  const elements = entries(doc, '@graph', '');
  for (const { node, path } of elements) {
    if (!isRecord(node)) continue;
    if (node.type === 'CreationInfo') graph.declare(node['@id'], fieldPath(path, '@id'));
    else graph.declare(node.spdxId, fieldPath(path, 'spdxId'));
  }

  for (const { node, path } of elements) {
    if (!isRecord(node) || node.type === 'CreationInfo') continue;
    if (typeof node.creationInfo === 'string') graph.reference(node.creationInfo, fieldPath(path, 'creationInfo'));

    if (node.type === 'Relationship') {
      graph.reference(node.from, fieldPath(path, 'from'));
      for (const target of entries(node, 'to', path)) graph.reference(target.node, target.path);
    }
    if (node.type === 'SpdxDocument') {
      for (const imported of entries(node, 'import', path)) {
        if (isRecord(imported.node)) graph.allowExternal(imported.node.externalSpdxId);
      }
      for (const key of ['rootElement', 'element']) {
        for (const target of entries(node, key, path)) graph.reference(target.node, target.path);
      }
    }
  }
}

export function validateReferenceGraph(doc: JsonRecord, dialect: GraphDialect, sink: DiagnosticSink): void {
  const graph = new IdentifierGraph(sink);
  switch (dialect) {
    case 'cyclonedx':
      collectCycloneDx(doc, graph);
      graph.resolve();
      break;
    case 'spdx2':
      collectSpdx2(doc, graph);
      graph.resolve(isSpdx2External);
      break;
    case 'spdx3':
      collectSpdx3(doc, graph);
      graph.resolve();
      break;
  }
}
