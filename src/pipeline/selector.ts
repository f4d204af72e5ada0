import type { ManifestDocument } from '../types/manifest.js';
import type { TargetSelector } from '../types/pipeline.js';
import { splitApiVersion } from '../utils/k8s-names.js';

export function matchesTarget(doc: ManifestDocument, target: TargetSelector): boolean {
  const { group, version } = splitApiVersion(doc.identity.apiVersion);
  if (target.group !== undefined && target.group !== group) return false;
  if (target.version !== undefined && target.version !== version) return false;
  if (target.kind !== undefined && target.kind !== doc.identity.kind) return false;
  if (target.name !== undefined && target.name !== doc.identity.name) return false;
  if (target.namespace !== undefined && target.namespace !== doc.identity.namespace) return false;
  return true;
}

export function describeTarget(target: TargetSelector): string {
  const parts = Object.entries(target)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return parts.length > 0 ? parts.join(',') : '(any)';
}
