import type { K8sManifest } from './k8s.js';

/**
 * The tuple that names one object in a manifest set. `namespace` is empty
 * when the document does not set one.
 */
export interface ManifestIdentity {
  apiVersion: string;
  kind: string;
  namespace: string;
  name: string;
}

export interface ManifestDocument {
  identity: ManifestIdentity;
  body: K8sManifest;
  /** Source file the document was read from, relative to its origin. */
  file: string;
}

export type ManifestSet = ManifestDocument[];
