import { describe, it, expect } from 'vitest';
import { syntheticChartMetadata } from '../../src/chart/metadata.js';
import { decodeRelease } from '../../src/release/codec.js';
import { releaseStorageObject, renderManifestText } from '../../src/release/object.js';
import type { K8sManifest } from '../../src/types/k8s.js';
import { doc, makeConfigMap } from '../helpers/manifests.js';

const hook: K8sManifest = {
  apiVersion: 'batch/v1',
  kind: 'Job',
  metadata: { name: 'migrate', annotations: { 'helm.sh/hook': 'pre-install' } },
};

const manifests = [doc(makeConfigMap('settings', { mode: 'fast' }), 'app/templates/cm.yaml'), doc(hook, 'app/templates/job.yaml')];
const now = new Date('2024-05-01T10:00:00.000Z');

describe('renderManifestText', () => {
  it('prints each document after a Source comment', () => {
    expect(renderManifestText(manifests.slice(0, 1))).toBe(
      '---\n# Source: app/templates/cm.yaml\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: settings\ndata:\n  mode: fast\n',
    );
  });
});

describe('releaseStorageObject', () => {
  const input = {
    release: 'web',
    namespace: 'prod',
    chart: syntheticChartMetadata('app', '0.2.0'),
    manifests,
    now,
  };

  it('builds the Secret helm install creates for revision 1', () => {
    const secret = releaseStorageObject({ ...input, driver: 'secret' });

    expect(secret.kind).toBe('Secret');
    expect(secret.type).toBe('helm.sh/release.v1');
    expect(secret.metadata).toEqual({
      name: 'sh.helm.release.v1.web.v1',
      namespace: 'prod',
      labels: { name: 'web', owner: 'helm', status: 'deployed', version: '1' },
    });

    const record = decodeRelease(Buffer.from(secret.data?.release ?? '', 'base64').toString('utf-8'));
    expect(record).toEqual({
      name: 'web',
      namespace: 'prod',
      revision: 1,
      status: 'deployed',
      chart: { name: 'app', version: '0.2.0', appVersion: '0.2.0' },
      manifestText: renderManifestText(manifests.slice(0, 1)),
      config: {},
    });
  });

  it('stores the payload unwrapped in a ConfigMap', () => {
    const configMap = releaseStorageObject({ ...input, driver: 'configmap' });

    expect(configMap.kind).toBe('ConfigMap');
    expect(configMap.type).toBeUndefined();
    expect(decodeRelease(configMap.data?.release ?? '').manifestText).toBe(renderManifestText(manifests.slice(0, 1)));
  });
});
