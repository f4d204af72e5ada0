import { gunzipSync, gzipSync } from 'node:zlib';
import { z } from 'zod';
import type { ReleaseRecord } from '../types/release.js';

const GZIP_MAGIC = [0x1f, 0x8b];

const storedReleaseSchema = z
  .object({
    name: z.string(),
    namespace: z.string().default(''),
    version: z.number().int(),
    manifest: z.string().default(''),
    config: z.record(z.string(), z.unknown()).nullish(),
    info: z.object({ status: z.string().default('unknown') }).passthrough().optional(),
    chart: z
      .object({
        metadata: z
          .object({
            name: z.string(),
            version: z.string(),
            appVersion: z.string().optional(),
          })
          .passthrough(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type StoredRelease = z.input<typeof storedReleaseSchema>;

/**
 * Decode the `release` payload of a Helm storage object: base64 text of a
 * gzipped (or plain) JSON release.
 */
export function decodeRelease(payload: string): ReleaseRecord {
  const bytes = Buffer.from(payload, 'base64');
  const isGzip = bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
  const json = (isGzip ? gunzipSync(bytes) : bytes).toString('utf-8');
  const stored = storedReleaseSchema.parse(JSON.parse(json));
  const chart = stored.chart?.metadata;

  return {
    name: stored.name,
    namespace: stored.namespace,
    revision: stored.version,
    status: stored.info?.status ?? 'unknown',
    ...(chart ? { chart: { name: chart.name, version: chart.version, appVersion: chart.appVersion } } : {}),
    manifestText: stored.manifest,
    config: stored.config ?? {},
  };
}

/** Inverse of `decodeRelease`, in the form helm writes it. */
export function encodeRelease(release: StoredRelease): string {
  return gzipSync(Buffer.from(JSON.stringify(release), 'utf-8')).toString('base64');
}
