import type { ChartMetadata } from '../types/chart.js';
import type { StorageDriver } from '../types/config.js';
import type { K8sManifest } from '../types/k8s.js';
import type { ManifestSet } from '../types/manifest.js';
import { manifestToYaml } from '../utils/yaml.js';
import { encodeRelease } from './codec.js';
import { isHook } from './diff.js';

export interface ReleaseObjectInput {
  release: string;
  namespace: string;
  chart: ChartMetadata;
  /** Rendered manifests; hooks are left out of the stored release. */
  manifests: ManifestSet;
  driver: StorageDriver;
  now?: Date;
}

/** Render documents the way helm stores and prints them. */
export function renderManifestText(manifests: ManifestSet): string {
  return manifests.map((doc) => `---\n# Source: ${doc.file}\n${manifestToYaml(doc.body)}`).join('');
}

/**
 * The storage object `helm install` would create for revision 1 of a
 * release holding `manifests`.
 */
export function releaseStorageObject(input: ReleaseObjectInput): K8sManifest {
  const { release, namespace, chart, driver } = input;
  const timestamp = (input.now ?? new Date()).toISOString();

  const payload = encodeRelease({
    name: release,
    namespace,
    version: 1,
    manifest: renderManifestText(input.manifests.filter((doc) => !isHook(doc.body))),
    config: {},
    info: {
      status: 'deployed',
      first_deployed: timestamp,
      last_deployed: timestamp,
      description: 'Install complete',
    },
    chart: { metadata: chart },
  });

  const metadata = {
    name: `sh.helm.release.v1.${release}.v1`,
    namespace,
    labels: { name: release, owner: 'helm', status: 'deployed', version: '1' },
  };

  if (driver === 'configmap') {
    return { apiVersion: 'v1', kind: 'ConfigMap', metadata, data: { release: payload } };
  }
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata,
    type: 'helm.sh/release.v1',
    data: { release: Buffer.from(payload, 'utf-8').toString('base64') },
  };
}
