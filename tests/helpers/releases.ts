import { encodeRelease, type StoredRelease } from '../../src/release/codec.js';

export function storedRelease(overrides: Partial<StoredRelease> = {}): StoredRelease {
  return {
    name: 'web',
    namespace: 'prod',
    version: 1,
    manifest: '',
    info: { status: 'deployed' },
    chart: { metadata: { name: 'app', version: '1.0.0' } },
    config: {},
    ...overrides,
  };
}

/** `kubectl get secrets -o json` output holding the given releases. */
export function secretList(releases: StoredRelease[]): string {
  return JSON.stringify({
    apiVersion: 'v1',
    kind: 'List',
    items: releases.map((release) => ({
      metadata: { name: `sh.helm.release.v1.${release.name}.v${release.version}` },
      data: { release: Buffer.from(encodeRelease(release), 'utf-8').toString('base64') },
    })),
  });
}

/** `kubectl get configmaps -o json` output holding the given releases. */
export function configMapList(releases: StoredRelease[]): string {
  return JSON.stringify({
    apiVersion: 'v1',
    kind: 'List',
    items: releases.map((release) => ({
      metadata: { name: `${release.name}.v${release.version}` },
      data: { release: encodeRelease(release) },
    })),
  });
}
