import { createTwoFilesPatch } from 'diff';
import { createPatch } from 'rfc6902';
import type { K8sManifest } from '../types/k8s.js';
import type { ManifestIdentity, ManifestSet } from '../types/manifest.js';
import { identityKey } from '../utils/k8s-names.js';
import { manifestToYaml } from '../utils/yaml.js';

export interface FieldChange {
  op: string;
  path: string;
}

export type DocumentChange =
  | { type: 'added'; identity: ManifestIdentity; desired: K8sManifest }
  | { type: 'removed'; identity: ManifestIdentity; current: K8sManifest }
  | {
      type: 'changed';
      identity: ManifestIdentity;
      current: K8sManifest;
      desired: K8sManifest;
      fields: FieldChange[];
      /** Unified diff of the two documents as YAML. */
      patch: string;
    };

const HOOK_ANNOTATION = 'helm.sh/hook';

/** Hooks are not part of a release's stored manifest. */
export function isHook(manifest: K8sManifest): boolean {
  return Boolean(manifest.metadata.annotations?.[HOOK_ANNOTATION]);
}

/**
 * Compare the live release's manifests with the desired ones, by identity.
 * Added and changed documents follow the desired order, removed documents
 * the current order.
 */
export function diffManifestSets(current: ManifestSet, desired: ManifestSet): DocumentChange[] {
  const currentByKey = new Map(current.map((doc) => [identityKey(doc.identity), doc]));
  const desiredKeys = new Set(desired.map((doc) => identityKey(doc.identity)));
  const changes: DocumentChange[] = [];

  for (const doc of desired) {
    const key = identityKey(doc.identity);
    const before = currentByKey.get(key);
    if (!before) {
      changes.push({ type: 'added', identity: doc.identity, desired: doc.body });
      continue;
    }

    const fields = createPatch(before.body, doc.body).map((op) => ({ op: op.op, path: op.path }));
    if (fields.length === 0) continue;

    changes.push({
      type: 'changed',
      identity: doc.identity,
      current: before.body,
      desired: doc.body,
      fields,
      patch: createTwoFilesPatch(key, key, manifestToYaml(before.body), manifestToYaml(doc.body), 'current', 'desired'),
    });
  }

  for (const doc of current) {
    if (!desiredKeys.has(identityKey(doc.identity))) {
      changes.push({ type: 'removed', identity: doc.identity, current: doc.body });
    }
  }

  return changes;
}

export interface DiffSummary {
  added: number;
  removed: number;
  changed: number;
}

export function summarizeChanges(changes: DocumentChange[]): DiffSummary {
  return {
    added: changes.filter((c) => c.type === 'added').length,
    removed: changes.filter((c) => c.type === 'removed').length,
    changed: changes.filter((c) => c.type === 'changed').length,
  };
}
