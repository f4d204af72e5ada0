import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { SourceResolutionError } from '../errors.js';
import type { ManifestSource } from '../types/source.js';
import { findChartFile, findKustomization, isChartReference } from '../utils/detect.js';

export interface DetectOptions {
  repo?: string;
  version?: string;
}

/**
 * Classify an input once. Local directories are probed for a kustomization
 * file, then Chart.yaml, and otherwise hold plain manifests; anything else
 * must be a chart reference.
 */
export async function detectSource(input: string, options: DetectOptions = {}): Promise<ManifestSource> {
  const path = resolve(input);
  const info = await stat(path).catch(() => null);

  if (info) {
    if (!info.isDirectory()) {
      throw new SourceResolutionError(input, 'unknown', 'expected a directory, got a file');
    }
    if (findKustomization(path)) return { kind: 'kustomize-overlay', origin: input, path };
    if (findChartFile(path)) return { kind: 'local-chart', origin: input, path };
    return { kind: 'plain-directory', origin: input, path };
  }

  if (isChartReference(input, options.repo)) {
    return {
      kind: 'remote-chart',
      origin: { reference: input, repo: options.repo, version: options.version },
      // Replaced by the fetched chart's directory during resolution.
      path: '',
    };
  }

  throw new SourceResolutionError(
    input,
    'unknown',
    'no such directory, and not a chart reference (REPO/CHART, oci://…, http(s)://…)',
  );
}
