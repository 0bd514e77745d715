// Reads an SBOM file from disk and hands back the parsed document tree.
// Serialization comes from an explicit hint, then the file extension, then a content sniff.

import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { MAX_FILE_BYTES } from '../constants';
import { SbomSerialization } from '../types';
import { parseCycloneDxXml } from './cyclonedx-xml';
import { parseTagValue } from './tag-value-parser';

export interface LoadedSbom {
  filePath: string;
  serialization: SbomSerialization;
  document: unknown;
}

export class SbomLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly serialization?: SbomSerialization,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'SbomLoadError';
  }
}

const messageOf = (e: unknown) => (e instanceof Error ? e.message : String(e));

const EXTENSIONS: Record<string, SbomSerialization> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.spdx': 'tag-value',
  '.xml': 'xml'
};

export function detectSerialization(filePath: string, text: string): SbomSerialization {
  const ext = path.extname(filePath).toLowerCase();
  if (Object.prototype.hasOwnProperty.call(EXTENSIONS, ext)) return EXTENSIONS[ext];

  const head = text.trimStart();
  if (head.startsWith('{') || head.startsWith('[')) return 'json';
  if (head.startsWith('<')) return 'xml';
  const firstLine = head.split(/\r?\n/).find(line => line.trim() && !line.startsWith('#'));
  if (firstLine?.startsWith('SPDXVersion:')) return 'tag-value';
  return 'yaml';
}

export async function parseSbomText(text: string, serialization: SbomSerialization): Promise<unknown> {
  switch (serialization) {
    case 'json': {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    }
    case 'yaml':
      // CORE_SCHEMA keeps unquoted timestamps as strings
      return yaml.load(text, { schema: yaml.CORE_SCHEMA });
    case 'tag-value':
      return parseTagValue(text);
    case 'xml':
      return parseCycloneDxXml(text);
  }
}

export async function loadSbomFile(filePath: string, hint?: SbomSerialization): Promise<LoadedSbom> {
  let text: string;
  try {
    const stats = await fs.stat(filePath);
    if (stats.size > MAX_FILE_BYTES) {
      throw new Error(`file is ${stats.size} bytes, above the ${MAX_FILE_BYTES} byte limit`);
    }
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new SbomLoadError(`cannot read ${filePath}: ${messageOf(e)}`, filePath, hint, e);
  }

  const serialization = hint ?? detectSerialization(filePath, text);
  try {
    return { filePath, serialization, document: await parseSbomText(text, serialization) };
  } catch (e) {
    throw new SbomLoadError(`${serialization} parse failed: ${messageOf(e)}`, filePath, serialization, e);
  }
}
