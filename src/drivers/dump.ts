import type { ReleaseStorage } from '../release/storage.js';
import type { ReleaseRecord } from '../types/release.js';
import { toYaml } from '../utils/yaml.js';

export interface DumpRequest {
  release: string;
  namespace?: string;
  /** Latest revision when absent. */
  revision?: number;
}

function summary(record: ReleaseRecord): Record<string, unknown> {
  return {
    name: record.name,
    namespace: record.namespace,
    revision: record.revision,
    status: record.status,
    ...(record.chart ? { chart: `${record.chart.name}-${record.chart.version}` } : {}),
    ...(Object.keys(record.config).length > 0 ? { config: record.config } : {}),
  };
}

/**
 * Print a stored release the way `helm get all` would: its summary fields
 * as YAML, then the manifest text exactly as stored.
 */
export async function dumpRelease(storage: ReleaseStorage, request: DumpRequest): Promise<string> {
  const record = await storage.getRelease(request.namespace, request.release, request.revision);
  const manifest = record.manifestText.endsWith('\n') || record.manifestText === ''
    ? record.manifestText
    : `${record.manifestText}\n`;
  return `${toYaml(summary(record))}manifest:\n${manifest}`;
}
