import { isMap, isNode, parseAllDocuments, stringify, type Document } from 'yaml';
import type { K8sManifest } from '../types/k8s.js';
import type { ManifestDocument } from '../types/manifest.js';
import { identityOf } from './k8s-names.js';

const stringifyOptions = {
  indent: 2,
  lineWidth: 0,
  defaultStringType: 'PLAIN',
  defaultKeyType: 'PLAIN',
  nullStr: '',
} as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serialize any value with the same settings used for manifests.
 */
export function toYaml(value: unknown): string {
  return stringify(value, stringifyOptions);
}

/**
 * Serialize a K8s manifest to YAML with proper ordering.
 */
export function manifestToYaml(manifest: K8sManifest): string {
  // Enforce K8s key ordering
  const ordered: Record<string, unknown> = {};
  const keyOrder = ['apiVersion', 'kind', 'metadata', 'type', 'spec', 'data', 'stringData'];

  for (const key of keyOrder) {
    if (key in manifest && manifest[key] !== undefined) {
      ordered[key] = manifest[key];
    }
  }

  // Add any remaining keys
  for (const [key, value] of Object.entries(manifest)) {
    if (!(key in ordered) && value !== undefined) {
      ordered[key] = value;
    }
  }

  return toYaml(ordered);
}

/**
 * Combine multiple manifests into a single multi-document YAML string.
 */
export function manifestsToMultiDoc(manifests: K8sManifest[]): string {
  return manifests.map((m) => `---\n${manifestToYaml(m)}`).join('');
}

export interface YamlDocument {
  value: unknown;
  /** File named by a `# Source:` comment, as emitted by `helm template`. */
  source?: string;
}

const SOURCE_COMMENT = /^\s*Source:\s*(.+?)\s*$/m;

function sourceComment(doc: Document): string | undefined {
  const contents = doc.contents;
  let first: unknown;
  if (isMap(contents) && contents.items.length > 0) {
    first = contents.items[0].key;
  }
  const comments = [
    doc.commentBefore,
    isNode(contents) ? contents.commentBefore : undefined,
    isNode(first) ? first.commentBefore : undefined,
  ];
  for (const comment of comments) {
    const match = comment ? SOURCE_COMMENT.exec(comment) : null;
    if (match) return match[1];
  }
  return undefined;
}

/**
 * Parse every document of a multi-document stream. Empty documents are
 * skipped; the first syntax error is raised with the document's origin.
 */
export function parseYamlStream(content: string, file: string): YamlDocument[] {
  const documents: YamlDocument[] = [];

  for (const doc of parseAllDocuments(content)) {
    const source = sourceComment(doc);
    const [error] = doc.errors;
    if (error) {
      throw new Error(`${source ?? file}: YAML parse error: ${error.message}`);
    }
    const value: unknown = doc.toJS();
    if (value === null || value === undefined) continue;
    documents.push(source ? { value, source } : { value });
  }

  return documents;
}

/**
 * Narrow a parsed YAML value to a manifest, requiring the fields that make
 * up its identity.
 */
export function toManifest(value: unknown, where: string): K8sManifest {
  if (!isRecord(value)) {
    throw new Error(`${where}: document is not a YAML mapping`);
  }

  const { apiVersion, kind, metadata } = value;
  if (
    typeof apiVersion !== 'string' ||
    typeof kind !== 'string' ||
    !isRecord(metadata) ||
    typeof metadata.name !== 'string'
  ) {
    const missing: string[] = [];
    if (typeof apiVersion !== 'string') missing.push('apiVersion');
    if (typeof kind !== 'string') missing.push('kind');
    if (!isRecord(metadata) || typeof metadata.name !== 'string') missing.push('metadata.name');
    throw new Error(`${where}: Missing required fields: ${missing.join(', ')}`);
  }

  return { ...value, apiVersion, kind, metadata: { ...metadata, name: metadata.name } };
}

/**
 * Parse a single or multi-document manifest stream. Empty documents are
 * skipped and `kind: List` documents are flattened into their items.
 */
export function parseManifestStream(content: string, file: string): ManifestDocument[] {
  const documents: ManifestDocument[] = [];

  for (const { value: parsed, source } of parseYamlStream(content, file)) {
    const origin = source ?? file;
    const values =
      isRecord(parsed) && parsed.kind === 'List' && Array.isArray(parsed.items)
        ? parsed.items
        : [parsed];

    for (const value of values) {
      const body = toManifest(value, origin);
      documents.push({ identity: identityOf(body), body, file: origin });
    }
  }

  return documents;
}
