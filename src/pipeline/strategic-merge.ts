import { readFile } from 'node:fs/promises';
import { PipelineStageError } from '../errors.js';
import type { ManifestDocument, ManifestSet } from '../types/manifest.js';
import { describeIdentity, identityOf } from '../utils/k8s-names.js';
import { isRecord, parseYamlStream, toManifest } from '../utils/yaml.js';

/** Fields whose list elements merge by key instead of being replaced. */
const MERGE_KEYS: Record<string, string> = {
  containers: 'name',
  initContainers: 'name',
  ephemeralContainers: 'name',
  volumes: 'name',
  env: 'name',
  imagePullSecrets: 'name',
  volumeMounts: 'mountPath',
  volumeDevices: 'devicePath',
  hostAliases: 'ip',
};

export interface StrategicMergePatch {
  kind: string;
  name: string;
  namespace?: string;
  apiVersion?: string;
  body: Record<string, unknown>;
}

export function parseStrategicMergePatch(content: string, file = 'patch'): StrategicMergePatch[] {
  const patches: StrategicMergePatch[] = [];

  for (const { value: body } of parseYamlStream(content, file)) {
    if (!isRecord(body)) {
      throw new Error('patch document is not a YAML mapping');
    }
    const { kind, metadata, apiVersion } = body;
    if (typeof kind !== 'string' || !isRecord(metadata) || typeof metadata.name !== 'string') {
      throw new Error('patch document needs kind and metadata.name');
    }
    patches.push({
      kind,
      name: metadata.name,
      namespace: typeof metadata.namespace === 'string' ? metadata.namespace : undefined,
      apiVersion: typeof apiVersion === 'string' ? apiVersion : undefined,
      body,
    });
  }

  return patches;
}

export async function loadStrategicMergePatch(file: string): Promise<StrategicMergePatch[]> {
  return parseStrategicMergePatch(await readFile(file, 'utf-8'), file);
}

function mergeKeyFor(field: string, items: Record<string, unknown>[]): string | undefined {
  if (field === 'ports') {
    // Container ports merge by containerPort, Service ports by port.
    if (items.some((item) => 'containerPort' in item)) return 'containerPort';
    if (items.some((item) => 'port' in item)) return 'port';
    return undefined;
  }
  return MERGE_KEYS[field];
}

function stripDirectives(value: unknown): unknown {
  if (isRecord(value)) return mergeMaps({}, value);
  if (Array.isArray(value)) return value.map(stripDirectives);
  return value;
}

function mergeMaps(
  original: Record<string, unknown>,
  patch: Record<string, unknown>,
): Record<string, unknown> {
  if (patch.$patch === 'replace') {
    const { $patch: _directive, ...rest } = patch;
    return mergeMaps({}, rest);
  }

  const result: Record<string, unknown> = { ...original };
  for (const [key, value] of Object.entries(patch)) {
    // $patch, $retainKeys, $setElementOrder/... are directives, not fields
    if (key.startsWith('$')) continue;

    if (value === null) {
      delete result[key];
    } else if (isRecord(value)) {
      if (value.$patch === 'delete') {
        delete result[key];
        continue;
      }
      const current = result[key];
      result[key] = mergeMaps(isRecord(current) ? current : {}, value);
    } else if (Array.isArray(value)) {
      const current = result[key];
      result[key] = mergeLists(key, Array.isArray(current) ? current : [], value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function mergeLists(field: string, original: unknown[], patch: unknown[]): unknown[] {
  const records = patch.filter(isRecord);
  if (records.some((item) => item.$patch === 'replace')) {
    return patch.filter((item) => !(isRecord(item) && item.$patch === 'replace')).map(stripDirectives);
  }

  const key = mergeKeyFor(field, [...records, ...original.filter(isRecord)]);
  if (!key || records.length !== patch.length) {
    return patch.map(stripDirectives);
  }

  const result = [...original];
  for (const item of records) {
    const index = result.findIndex((existing) => isRecord(existing) && existing[key] === item[key]);
    if (item.$patch === 'delete') {
      if (index !== -1) result.splice(index, 1);
      continue;
    }
    if (index === -1) {
      result.push(mergeMaps({}, item));
    } else {
      const existing = result[index];
      result[index] = mergeMaps(isRecord(existing) ? existing : {}, item);
    }
  }
  return result;
}

/**
 * Merge a partial object into a manifest body with Kubernetes strategic
 * merge semantics: maps merge recursively, `null` deletes a key, keyed lists
 * merge element by element, other lists are replaced.
 */
export function strategicMerge(
  original: Record<string, unknown>,
  patch: Record<string, unknown>,
): Record<string, unknown> {
  return mergeMaps(original, patch);
}

function matchesPatch(doc: ManifestDocument, patch: StrategicMergePatch): boolean {
  const { identity } = doc;
  if (identity.kind !== patch.kind || identity.name !== patch.name) return false;
  if (patch.namespace !== undefined && identity.namespace !== patch.namespace) return false;
  if (patch.apiVersion !== undefined && identity.apiVersion !== patch.apiVersion) return false;
  return true;
}

export interface MergeOutcome {
  manifests: ManifestSet;
  unmatched: string[];
}

export function applyStrategicMergePatches(
  set: ManifestSet,
  patches: StrategicMergePatch[],
  stage: string,
): MergeOutcome {
  let manifests = set;
  const unmatched: string[] = [];

  for (const patch of patches) {
    if (patch.body.$patch === 'delete') {
      const kept = manifests.filter((doc) => !matchesPatch(doc, patch));
      if (kept.length === manifests.length) unmatched.push(`${patch.kind}/${patch.name}`);
      manifests = kept;
      continue;
    }

    let matched = 0;
    manifests = manifests.map((doc) => {
      if (!matchesPatch(doc, patch)) return doc;
      matched++;
      const merged = strategicMerge(doc.body, patch.body);
      try {
        const body = toManifest(merged, doc.file);
        return { identity: identityOf(body), body, file: doc.file };
      } catch (err) {
        throw new PipelineStageError(stage, 'patch removed identity fields', describeIdentity(doc.identity), {
          cause: err,
        });
      }
    });
    if (matched === 0) unmatched.push(`${patch.kind}/${patch.name}`);
  }

  return { manifests, unmatched };
}
