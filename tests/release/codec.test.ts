import { describe, it, expect } from 'vitest';
import { decodeRelease, encodeRelease } from '../../src/release/codec.js';
import { storedRelease } from '../helpers/releases.js';

describe('decodeRelease', () => {
  it('decodes a gzipped release payload', () => {
    const payload = encodeRelease(
      storedRelease({
        version: 3,
        manifest: '---\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: a\n',
        config: { replicas: 2 },
        chart: { metadata: { name: 'app', version: '1.2.0', appVersion: '5.0' } },
      }),
    );

    expect(decodeRelease(payload)).toEqual({
      name: 'web',
      namespace: 'prod',
      revision: 3,
      status: 'deployed',
      chart: { name: 'app', version: '1.2.0', appVersion: '5.0' },
      manifestText: '---\napiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: a\n',
      config: { replicas: 2 },
    });
  });

  it('accepts uncompressed JSON', () => {
    const payload = Buffer.from(JSON.stringify({ name: 'web', version: 1 })).toString('base64');
    expect(decodeRelease(payload)).toEqual({
      name: 'web',
      namespace: '',
      revision: 1,
      status: 'unknown',
      manifestText: '',
      config: {},
    });
  });

  it('rejects payloads that are not releases', () => {
    const payload = Buffer.from(JSON.stringify({ hello: 'world' })).toString('base64');
    expect(() => decodeRelease(payload)).toThrow();
  });
});
