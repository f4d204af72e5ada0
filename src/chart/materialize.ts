import { mkdir, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { MaterializationError } from '../errors.js';
import type { ChartMetadata } from '../types/chart.js';
import type { ManifestSet } from '../types/manifest.js';
import { identityKey, manifestFileName } from '../utils/k8s-names.js';
import { manifestToYaml, toYaml } from '../utils/yaml.js';
import { orderChartMetadata } from './metadata.js';

export interface MaterializeInput {
  metadata: ChartMetadata;
  /**
   * Concrete manifests that replace the chart's templates. When absent the
   * chart's own templates are kept.
   */
  manifests?: ManifestSet;
}

/**
 * Files a rendered chart no longer needs: bundled or pinned subcharts, and
 * CRDs, which were rendered into the manifests.
 */
const RENDERED_FILES = ['charts', 'crds', 'requirements.yaml', 'requirements.lock', 'Chart.lock'];

async function step(path: string, fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    throw new MaterializationError(path, { cause: err });
  }
}

/**
 * Literal manifests must survive helm's template engine, so template
 * delimiters in them are emitted as template string literals.
 */
export function escapeTemplateDelimiters(text: string): string {
  return text.replace(/\{\{|\}\}/g, (delimiter) => `{{ "${delimiter}" }}`);
}

/**
 * Pick a templates/ file name per document: `<kind>-<name>.yaml`, prefixed
 * by the namespace when two documents share kind and name, and numbered as
 * a last resort.
 */
export function assignTemplateFileNames(manifests: ManifestSet): Map<string, string> {
  const stemCounts = new Map<string, number>();
  for (const doc of manifests) {
    const name = manifestFileName(doc.identity);
    stemCounts.set(name, (stemCounts.get(name) ?? 0) + 1);
  }

  const taken = new Set<string>();
  const names = new Map<string, string>();
  for (const doc of manifests) {
    const plain = manifestFileName(doc.identity);
    let name = (stemCounts.get(plain) ?? 0) > 1 ? manifestFileName(doc.identity, true) : plain;
    for (let n = 2; taken.has(name); n++) {
      name = `${plain.replace(/\.yaml$/, '')}-${n}.yaml`;
    }
    taken.add(name);
    names.set(identityKey(doc.identity), name);
  }
  return names;
}

/**
 * Write a complete chart into `chartDir`. Every write must succeed; the
 * first failure raises `MaterializationError` and the caller discards the
 * directory.
 *
 * @returns paths of the written files, relative to `chartDir`
 */
export async function materializeChart(chartDir: string, input: MaterializeInput): Promise<string[]> {
  const written: string[] = [];
  const { metadata, manifests } = input;

  await step(chartDir, () => mkdir(chartDir, { recursive: true }));

  if (manifests) {
    const templatesDir = join(chartDir, 'templates');
    await step(templatesDir, () => rm(templatesDir, { recursive: true, force: true }));
    // Rendered output already contains every subchart's objects and CRDs.
    for (const name of RENDERED_FILES) {
      const path = join(chartDir, name);
      await step(path, () => rm(path, { recursive: true, force: true }));
    }
    await step(templatesDir, () => mkdir(templatesDir, { recursive: true }));

    const fileNames = assignTemplateFileNames(manifests);
    for (const doc of manifests) {
      const name = fileNames.get(identityKey(doc.identity)) ?? manifestFileName(doc.identity);
      const path = join(templatesDir, name);
      await step(path, () => writeFile(path, escapeTemplateDelimiters(manifestToYaml(doc.body)), 'utf-8'));
      written.push(join('templates', name));
    }
  }

  if (metadata.apiVersion !== 'v1') {
    // v2 charts list dependencies in Chart.yaml only.
    for (const name of ['requirements.yaml', 'requirements.lock']) {
      const path = join(chartDir, name);
      await step(path, () => rm(path, { force: true }));
    }
  }

  const chartFile = join(chartDir, 'Chart.yaml');
  await step(chartFile, () => writeFile(chartFile, toYaml(orderChartMetadata(metadata)), 'utf-8'));
  written.push('Chart.yaml');

  const valuesFile = join(chartDir, 'values.yaml');
  if (!existsSync(valuesFile)) {
    await step(valuesFile, () => writeFile(valuesFile, '', 'utf-8'));
    written.push('values.yaml');
  }

  return written;
}
