import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ChartMetadata } from '../types/chart.js';

/** Version used for generated charts when none is given. */
export const DEFAULT_CHART_VERSION = '1.0.0';

const versionLike = z.union([z.string(), z.number()]).transform(String);

const dependencySchema = z
  .object({
    name: z.string(),
    version: versionLike.optional(),
    repository: z.string().optional(),
    alias: z.string().optional(),
    condition: z.string().optional(),
  })
  .passthrough();

const chartMetadataSchema = z
  .object({
    apiVersion: z.string().default('v1'),
    name: z.string(),
    version: versionLike,
    appVersion: versionLike.optional(),
    description: z.string().optional(),
    dependencies: z.array(dependencySchema).optional(),
  })
  .passthrough();

const requirementsSchema = z.object({
  dependencies: z.array(dependencySchema).default([]),
});

/**
 * Read a chart's Chart.yaml. For `apiVersion: v1` charts the dependencies
 * of requirements.yaml are folded into the result.
 */
export async function readChartMetadata(chartDir: string): Promise<ChartMetadata> {
  const raw = await readFile(join(chartDir, 'Chart.yaml'), 'utf-8');
  const metadata: ChartMetadata = chartMetadataSchema.parse(parseYaml(raw) ?? {});

  const requirementsPath = join(chartDir, 'requirements.yaml');
  if (metadata.apiVersion === 'v1' && existsSync(requirementsPath)) {
    const requirements = requirementsSchema.parse(
      parseYaml(await readFile(requirementsPath, 'utf-8')) ?? {},
    );
    if (requirements.dependencies.length > 0) {
      metadata.dependencies = [...(metadata.dependencies ?? []), ...requirements.dependencies];
    }
  }

  return metadata;
}

/**
 * Chart.yaml for a chart generated from plain manifests. `version` and
 * `appVersion` both carry the requested version.
 */
export function syntheticChartMetadata(name: string, version?: string): ChartMetadata {
  const resolved = version || DEFAULT_CHART_VERSION;
  return {
    apiVersion: 'v2',
    name,
    description: 'A Helm chart for Kubernetes',
    version: resolved,
    appVersion: resolved,
  };
}

export function hasDependencies(metadata: ChartMetadata): boolean {
  return (metadata.dependencies?.length ?? 0) > 0;
}

/** Order Chart.yaml keys the way `helm create` writes them. */
export function orderChartMetadata(metadata: ChartMetadata): Record<string, unknown> {
  const ordered: Record<string, unknown> = {};
  const keyOrder = ['apiVersion', 'name', 'description', 'type', 'version', 'appVersion'];

  for (const key of keyOrder) {
    if (metadata[key] !== undefined) ordered[key] = metadata[key];
  }
  for (const [key, value] of Object.entries(metadata)) {
    if (key in ordered || value === undefined) continue;
    if (key === 'dependencies' && !hasDependencies(metadata)) continue;
    ordered[key] = value;
  }

  return ordered;
}
