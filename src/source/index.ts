import { cp, mkdir, readdir, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, join } from 'node:path';
import { SourceResolutionError, causeMessage } from '../errors.js';
import { hasDependencies, readChartMetadata, syntheticChartMetadata } from '../chart/metadata.js';
import type { HelmClient } from '../tools/helm.js';
import type { KustomizeClient } from '../tools/kustomize.js';
import type { ChartifyOptions } from '../types/config.js';
import type { ManifestSet } from '../types/manifest.js';
import type { ManifestSource, ResolvedSource, SourceVariant } from '../types/source.js';
import { isManifestFileName } from '../utils/detect.js';
import { toChartName } from '../utils/k8s-names.js';
import type { Logger } from '../utils/logger.js';
import type { Workspace } from '../utils/workspace.js';
import { parseManifestStream } from '../utils/yaml.js';

export { detectSource } from './detect.js';

export interface ResolveContext {
  workspace: Workspace;
  helm: HelmClient;
  kustomize: KustomizeClient;
  logger: Logger;
  /** Render charts to concrete manifests, because a pipeline stage needs them. */
  render: boolean;
}

/**
 * Turn a classified source into a chart directory inside the workspace plus
 * its raw manifest set.
 */
export async function resolveSource(
  source: ManifestSource,
  options: ChartifyOptions,
  ctx: ResolveContext,
): Promise<ResolvedSource> {
  switch (source.kind) {
    case 'plain-directory':
      return resolvePlainDirectory(source, options, ctx);
    case 'kustomize-overlay':
      return resolveKustomizeOverlay(source, options, ctx);
    case 'local-chart':
      return resolveLocalChart(source, source.path, options, ctx);
    case 'remote-chart':
      return resolveRemoteChart(source, options, ctx);
    default: {
      const unreachable: never = source;
      throw new Error(`Unhandled source ${JSON.stringify(unreachable)}`);
    }
  }
}

async function resolvePlainDirectory(
  source: Extract<ManifestSource, { kind: 'plain-directory' }>,
  options: ChartifyOptions,
  ctx: ResolveContext,
): Promise<ResolvedSource> {
  const entries = await readdir(source.path, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && isManifestFileName(e.name))
    .map((e) => e.name)
    .sort();

  if (files.length === 0) {
    throw new SourceResolutionError(source.origin, source.kind, 'no *.yaml or *.yml manifest files found');
  }

  const manifests: ManifestSet = [];
  for (const file of files) {
    const content = await readFile(join(source.path, file), 'utf-8');
    manifests.push(...parseOrFail(content, file, source.origin, source.kind));
  }
  if (manifests.length === 0) {
    throw new SourceResolutionError(source.origin, source.kind, 'manifest files contain no documents');
  }
  ctx.logger.debug(`Read ${manifests.length} manifests from ${files.length} files in ${source.path}`);

  return generatedChart(source, options, ctx, manifests);
}

async function resolveKustomizeOverlay(
  source: Extract<ManifestSource, { kind: 'kustomize-overlay' }>,
  options: ChartifyOptions,
  ctx: ResolveContext,
): Promise<ResolvedSource> {
  const output = await ctx.kustomize.build(source.path);
  const manifests = parseOrFail(output, 'kustomized.yaml', source.origin, source.kind);
  if (manifests.length === 0) {
    throw new SourceResolutionError(source.origin, source.kind, 'kustomize build produced no manifests');
  }
  ctx.logger.debug(`kustomize build produced ${manifests.length} manifests`);

  return generatedChart(source, options, ctx, manifests);
}

function generatedChart(
  source: ManifestSource,
  options: ChartifyOptions,
  ctx: ResolveContext,
  manifests: ManifestSet,
): ResolvedSource {
  if (!options.chartVersion) {
    ctx.logger.debug('No --version given, using the default chart version');
  }
  const metadata = syntheticChartMetadata(toChartName(basename(source.path)), options.chartVersion);
  return { source, chartDir: ctx.workspace.path(metadata.name), metadata, manifests };
}

async function resolveLocalChart(
  source: ManifestSource,
  chartPath: string,
  options: ChartifyOptions,
  ctx: ResolveContext,
): Promise<ResolvedSource> {
  const metadata = await readChartMetadata(chartPath).catch((err: unknown) => {
    throw new SourceResolutionError(
      chartPath,
      source.kind,
      `invalid Chart.yaml: ${causeMessage(err)}`,
      { cause: err },
    );
  });

  const chartDir = ctx.workspace.path(toChartName(metadata.name));
  await cp(chartPath, chartDir, { recursive: true });
  ctx.logger.debug(`Copied chart ${metadata.name} to ${chartDir}`);

  if (!ctx.render) {
    return { source, chartDir, metadata };
  }

  const rendered = await ctx.helm.template({
    releaseName: options.releaseName,
    chartDir,
    namespace: options.namespace,
    values: options.values,
    dependencyUpdate: hasDependencies(metadata) && !existsSync(join(chartDir, 'charts')),
    includeCrds: true,
  });
  const manifests = parseOrFail(rendered, 'rendered.yaml', chartPath, source.kind);
  ctx.logger.debug(`helm template rendered ${manifests.length} manifests`);

  return { source, chartDir, metadata, manifests };
}

async function resolveRemoteChart(
  source: Extract<ManifestSource, { kind: 'remote-chart' }>,
  options: ChartifyOptions,
  ctx: ResolveContext,
): Promise<ResolvedSource> {
  const destination = ctx.workspace.path('.fetch');
  await mkdir(destination, { recursive: true });
  await ctx.helm.pull({
    reference: source.origin.reference,
    destination,
    version: source.origin.version,
    repo: source.origin.repo,
  });

  const entries = await readdir(destination, { withFileTypes: true });
  const chartDirName = entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .find((name) => existsSync(join(destination, name, 'Chart.yaml')));
  if (!chartDirName) {
    throw new SourceResolutionError(source.origin.reference, source.kind, 'fetched archive contains no Chart.yaml');
  }

  const fetched = { ...source, path: join(destination, chartDirName) };
  ctx.logger.debug(`Fetched ${source.origin.reference} into ${fetched.path}`);
  return resolveLocalChart(fetched, fetched.path, options, ctx);
}

function parseOrFail(content: string, file: string, origin: string, variant: SourceVariant): ManifestSet {
  try {
    return parseManifestStream(content, file);
  } catch (err) {
    throw new SourceResolutionError(origin, variant, `invalid manifest: ${causeMessage(err)}`, { cause: err });
  }
}
