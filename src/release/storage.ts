import { z } from 'zod';
import { ReleaseNotFoundError } from '../errors.js';
import type { KubectlClient } from '../tools/kubectl.js';
import type { StorageDriver } from '../types/config.js';
import type { ReleaseRecord } from '../types/release.js';
import { decodeRelease } from './codec.js';

export interface ReleaseStorage {
  /** The given revision, or the latest one. */
  getRelease(namespace: string | undefined, name: string, revision?: number): Promise<ReleaseRecord>;
  /** The latest revision of every release, sorted by name. */
  listReleases(namespace?: string): Promise<ReleaseRecord[]>;
}

const storageListSchema = z.object({
  items: z.array(
    z.object({
      data: z.record(z.string(), z.string()).nullish(),
    }).passthrough(),
  ).default([]),
});

function latest(records: ReleaseRecord[]): ReleaseRecord {
  return records.reduce((a, b) => (b.revision > a.revision ? b : a));
}

/**
 * Reads Helm's release records from the Secrets (or ConfigMaps) helm keeps
 * in the release namespace, labelled `owner=helm`.
 */
export class KubectlReleaseStorage implements ReleaseStorage {
  constructor(
    private readonly kubectl: KubectlClient,
    private readonly driver: StorageDriver = 'secret',
  ) {}

  private async load(namespace: string | undefined, selector: string): Promise<ReleaseRecord[]> {
    const resource = this.driver === 'secret' ? 'secrets' : 'configmaps';
    const list = storageListSchema.parse(await this.kubectl.list(resource, selector, namespace));

    return list.items.flatMap((item) => {
      const payload = item.data?.release;
      if (!payload) return [];
      // Secret data carries one more layer of base64 than ConfigMap data.
      const encoded = this.driver === 'secret' ? Buffer.from(payload, 'base64').toString('utf-8') : payload;
      return [decodeRelease(encoded)];
    });
  }

  async getRelease(namespace: string | undefined, name: string, revision?: number): Promise<ReleaseRecord> {
    const records = (await this.load(namespace, `owner=helm,name=${name}`)).filter(
      (r) => r.name === name && (revision === undefined || r.revision === revision),
    );
    if (records.length === 0) {
      throw new ReleaseNotFoundError(namespace, name, revision);
    }
    return latest(records);
  }

  async listReleases(namespace?: string): Promise<ReleaseRecord[]> {
    const byRelease = new Map<string, ReleaseRecord[]>();
    for (const record of await this.load(namespace, 'owner=helm')) {
      const key = `${record.namespace}/${record.name}`;
      byRelease.set(key, [...(byRelease.get(key) ?? []), record]);
    }
    return [...byRelease.values()]
      .map(latest)
      .sort((a, b) => a.name.localeCompare(b.name) || a.namespace.localeCompare(b.namespace));
  }
}
