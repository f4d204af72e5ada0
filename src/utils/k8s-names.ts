import type { K8sManifest } from '../types/k8s.js';
import type { ManifestIdentity } from '../types/manifest.js';

/**
 * Convert a directory name to a valid Helm chart name.
 * Lowercase, replace _/. with -, max 63 chars, must start/end alphanumeric.
 */
export function toChartName(dirName: string): string {
  let name = dirName
    .toLowerCase()
    .replace(/[_.\s]/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '');

  if (name.length > 63) {
    name = name.slice(0, 63).replace(/-$/, '');
  }

  return name || 'chart';
}

export function identityOf(manifest: K8sManifest): ManifestIdentity {
  return {
    apiVersion: manifest.apiVersion,
    kind: manifest.kind,
    namespace: manifest.metadata.namespace ?? '',
    name: manifest.metadata.name,
  };
}

export function identityKey(identity: ManifestIdentity): string {
  return `${identity.apiVersion}/${identity.kind}/${identity.namespace}/${identity.name}`;
}

/**
 * Human-readable form used in logs and errors, e.g. `Deployment/web` or
 * `Deployment/web (ns: prod)`.
 */
export function describeIdentity(identity: ManifestIdentity): string {
  const ns = identity.namespace ? ` (ns: ${identity.namespace})` : '';
  return `${identity.kind}/${identity.name}${ns}`;
}

/**
 * Split an apiVersion into its API group and version. The core group is ''.
 */
export function splitApiVersion(apiVersion: string): { group: string; version: string } {
  const slash = apiVersion.lastIndexOf('/');
  if (slash === -1) return { group: '', version: apiVersion };
  return { group: apiVersion.slice(0, slash), version: apiVersion.slice(slash + 1) };
}

/**
 * File name for a document written into a chart's templates directory.
 */
export function manifestFileName(identity: ManifestIdentity, withNamespace = false): string {
  const parts = withNamespace && identity.namespace
    ? [identity.namespace, identity.kind, identity.name]
    : [identity.kind, identity.name];
  const stem = parts
    .join('-')
    .toLowerCase()
    .replace(/[^a-z0-9.-]/g, '-')
    .replace(/-+/g, '-');
  return `${stem}.yaml`;
}
