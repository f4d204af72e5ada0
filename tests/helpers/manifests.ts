import type { K8sManifest } from '../../src/types/k8s.js';
import type { ManifestDocument } from '../../src/types/manifest.js';
import { identityOf } from '../../src/utils/k8s-names.js';

export function makeDeployment(name: string, namespace?: string): K8sManifest {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name, ...(namespace ? { namespace } : {}), labels: { app: name } },
    spec: {
      replicas: 1,
      selector: { matchLabels: { app: name } },
      template: {
        metadata: { labels: { app: name } },
        spec: { containers: [{ name, image: `${name}:1.0` }] },
      },
    },
  };
}

export function makeService(name: string, port = 80): K8sManifest {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name },
    spec: { selector: { app: name }, ports: [{ name: 'http', port, targetPort: port }] },
  };
}

export function makeConfigMap(name: string, data: Record<string, string> = {}): K8sManifest {
  return { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name }, data };
}

export function doc(body: K8sManifest, file = 'manifests.yaml'): ManifestDocument {
  return { identity: identityOf(body), body, file };
}
