import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfigFile, resolveRunConfig, type CliFlags } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/errors.js';

const configDir = resolve(import.meta.dirname, '../fixtures/config');

function flags(overrides: Partial<CliFlags> = {}): CliFlags {
  return { values: [], set: [], stages: [], dependencies: [], ...overrides };
}

describe('loadConfigFile', () => {
  it('parses the file and remembers its directory', async () => {
    const loaded = await loadConfigFile(resolve(configDir, 'chartify.yaml'));
    expect(loaded.dir).toBe(configDir);
    expect(loaded.file.namespace).toBe('staging');
    expect(loaded.file.version).toBe('2');
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(loadConfigFile(resolve(configDir, 'missing.yaml'))).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('resolveRunConfig', () => {
  it('uses defaults without flags or file', () => {
    const config = resolveRunConfig('myapp', flags(), undefined, {}, '/work');

    expect(config).toEqual({
      chartify: {
        releaseName: 'myapp',
        values: { files: [], set: [] },
        stages: [],
        dependencies: [],
        strictPatches: false,
        debug: false,
      },
      tools: { helm: 'helm', kubectl: 'kubectl', kustomize: 'kustomize' },
      cluster: { storageDriver: 'secret' },
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.chartify.stages)).toBe(true);
  });

  it('merges the file under the command line', async () => {
    const loaded = await loadConfigFile(resolve(configDir, 'chartify.yaml'));
    const config = resolveRunConfig(
      'myapp',
      flags({
        namespace: 'prod',
        values: ['local.yaml'],
        set: ['image.tag=v2'],
        stages: [{ type: 'strategic-merge-patch', file: 'extra.yaml' }],
        dependencies: ['cache=stable/redis'],
      }),
      loaded,
      {},
      '/work',
    );

    expect(config.chartify.namespace).toBe('prod');
    expect(config.chartify.chartVersion).toBe('2');
    expect(config.chartify.values).toEqual({
      files: [resolve(configDir, 'values/base.yaml'), 'https://example.com/values.yaml', '/work/local.yaml'],
      set: ['image.tag=v1', 'image.tag=v2'],
    });
    expect(config.chartify.stages).toEqual([
      { type: 'strategic-merge-patch', file: resolve(configDir, 'patches/sidecar.yaml') },
      { type: 'inject', command: ['istioctl', 'kube-inject', '-f', 'FILE'] },
      { type: 'json-patch', file: '/abs/patch.yaml', target: { kind: 'Deployment' } },
      { type: 'strategic-merge-patch', file: '/work/extra.yaml' },
    ]);
    expect(config.chartify.dependencies.map((d) => d.alias)).toEqual(['mydb', 'redis', 'cache']);
    expect(config.chartify.dependencies[1]).toEqual({
      alias: 'redis',
      repository: 'https://charts.example.com',
      chart: 'redis',
      version: '*',
    });
    expect(config.tools.helm).toBe('/opt/helm3');
    expect(config.cluster.storageDriver).toBe('configmap');
  });

  it('lets the environment pick the tool binaries', async () => {
    const loaded = await loadConfigFile(resolve(configDir, 'chartify.yaml'));
    const config = resolveRunConfig('myapp', flags(), loaded, { HELM_BIN: '/usr/local/bin/helm', KUBECTL_BIN: 'oc' });
    expect(config.tools).toEqual({ helm: '/usr/local/bin/helm', kubectl: 'oc', kustomize: 'kustomize' });
  });

  it('rejects malformed dependency flags', () => {
    expect(() => resolveRunConfig('myapp', flags({ dependencies: ['nope'] }), undefined, {})).toThrow(
      ConfigurationError,
    );
  });
});
