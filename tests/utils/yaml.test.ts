import { describe, it, expect } from 'vitest';
import {
  manifestToYaml,
  manifestsToMultiDoc,
  parseManifestStream,
  parseYamlStream,
} from '../../src/utils/yaml.js';
import type { K8sManifest } from '../../src/types/k8s.js';

describe('manifestToYaml', () => {
  it('serializes with correct key ordering', () => {
    const manifest: K8sManifest = {
      spec: { replicas: 1 },
      kind: 'Deployment',
      apiVersion: 'apps/v1',
      metadata: { name: 'test' },
    };

    const lines = manifestToYaml(manifest).split('\n');

    const apiVersionIdx = lines.findIndex((l) => l.startsWith('apiVersion'));
    const kindIdx = lines.findIndex((l) => l.startsWith('kind'));
    const metadataIdx = lines.findIndex((l) => l.startsWith('metadata'));
    const specIdx = lines.findIndex((l) => l.startsWith('spec'));

    expect(apiVersionIdx).toBeLessThan(kindIdx);
    expect(kindIdx).toBeLessThan(metadataIdx);
    expect(metadataIdx).toBeLessThan(specIdx);
  });

  it('uses 2-space indentation', () => {
    const manifest: K8sManifest = {
      apiVersion: 'v1',
      kind: 'Service',
      metadata: { name: 'test', labels: { app: 'test' } },
    };

    expect(manifestToYaml(manifest)).toContain('  name: test');
  });
});

describe('manifestsToMultiDoc', () => {
  it('prefixes every document with ---', () => {
    const a: K8sManifest = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'a' } };
    const b: K8sManifest = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'b' } };

    expect(manifestsToMultiDoc([a, b])).toBe(
      '---\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: a\n' +
        '---\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: b\n',
    );
  });
});

describe('parseYamlStream', () => {
  it('drops empty documents and keeps helm source comments', () => {
    const docs = parseYamlStream(
      '---\n# Source: app/templates/svc.yaml\nkind: Service\n---\n\n--- # trailing\nkind: Pod\n',
      'rendered.yaml',
    );

    expect(docs).toEqual([
      { value: { kind: 'Service' }, source: 'app/templates/svc.yaml' },
      { value: { kind: 'Pod' } },
    ]);
  });

  it('splits on separators that carry content', () => {
    const docs = parseYamlStream('kind: A\n--- !!map\nkind: B\n--- {kind: C}\n', 'inline.yaml');

    expect(docs.map((d) => d.value)).toEqual([{ kind: 'A' }, { kind: 'B' }, { kind: 'C' }]);
  });

  it('names the file of a document with a syntax error', () => {
    expect(() => parseYamlStream('kind: A\n---\nkind: [B\n', 'broken.yaml')).toThrow('broken.yaml: YAML parse error:');
  });
});

describe('parseManifestStream', () => {
  it('parses every document with its identity and file', () => {
    const docs = parseManifestStream(
      'apiVersion: v1\nkind: Service\nmetadata:\n  name: web\n---\n' +
        'apiVersion: apps/v1\nkind: Deployment\nmetadata:\n  name: web\n  namespace: prod\n',
      'app.yaml',
    );

    expect(docs.map((d) => d.identity)).toEqual([
      { apiVersion: 'v1', kind: 'Service', namespace: '', name: 'web' },
      { apiVersion: 'apps/v1', kind: 'Deployment', namespace: 'prod', name: 'web' },
    ]);
    expect(docs.every((d) => d.file === 'app.yaml')).toBe(true);
  });

  it('flattens List documents', () => {
    const docs = parseManifestStream(
      [
        'apiVersion: v1',
        'kind: List',
        'items:',
        '  - apiVersion: v1',
        '    kind: ConfigMap',
        '    metadata:',
        '      name: one',
        '  - apiVersion: v1',
        '    kind: ConfigMap',
        '    metadata:',
        '      name: two',
        '',
      ].join('\n'),
      'list.yaml',
    );

    expect(docs.map((d) => d.identity.name)).toEqual(['one', 'two']);
  });

  it('skips documents that are empty or only comments', () => {
    const docs = parseManifestStream('# nothing here\n---\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: a\n', 'a.yaml');
    expect(docs).toHaveLength(1);
  });

  it('parses documents whose separator line carries a tag', () => {
    const docs = parseManifestStream(
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: a\n--- !!map\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: b\n',
      'tagged.yaml',
    );
    expect(docs.map((d) => d.identity.name)).toEqual(['a', 'b']);
  });

  it('attributes documents to the file named by a Source comment', () => {
    const docs = parseManifestStream(
      '---\n# Source: app/templates/cm.yaml\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: a\n',
      'rendered.yaml',
    );
    expect(docs[0].file).toBe('app/templates/cm.yaml');
  });

  it('names the missing identity fields', () => {
    expect(() => parseManifestStream('apiVersion: v1\nmetadata: {}\n', 'bad.yaml')).toThrow(
      'bad.yaml: Missing required fields: kind, metadata.name',
    );
  });

  it('rejects documents that are not mappings', () => {
    expect(() => parseManifestStream('- a\n- b\n', 'list.yaml')).toThrow('list.yaml: document is not a YAML mapping');
  });
});
