import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

const KUSTOMIZATION_FILE_NAMES = [
  'kustomization.yaml',
  'kustomization.yml',
  'Kustomization',
];

const MANIFEST_FILE_PATTERN = /\.ya?ml$/;

/**
 * Find the kustomization file of an overlay directory.
 */
export function findKustomization(dir: string): string | null {
  for (const name of KUSTOMIZATION_FILE_NAMES) {
    const fullPath = resolve(dir, name);
    if (existsSync(fullPath)) return fullPath;
  }
  return null;
}

/**
 * Find the Chart.yaml of a chart directory.
 */
export function findChartFile(dir: string): string | null {
  const chartPath = resolve(dir, 'Chart.yaml');
  return existsSync(chartPath) ? chartPath : null;
}

export function isManifestFileName(name: string): boolean {
  return MANIFEST_FILE_PATTERN.test(name);
}

/**
 * Whether an input that is not a local path names a chart to fetch:
 * `REPO/CHART`, `oci://…` or an `http(s)://` archive URL. A bare chart name
 * counts when a repository URL is given separately.
 */
export function isChartReference(input: string, repo?: string): boolean {
  if (/^(oci|https?):\/\//.test(input)) return true;
  if (/^[A-Za-z0-9][\w.-]*\/[A-Za-z0-9][\w.-]*$/.test(input)) return true;
  return Boolean(repo) && /^[A-Za-z0-9][\w.-]*$/.test(input);
}
