import { mergeDependencies } from './chart/dependencies.js';
import { materializeChart } from './chart/materialize.js';
import type { CommandRunner } from './exec/runner.js';
import { runPipeline } from './pipeline/index.js';
import { detectSource, resolveSource } from './source/index.js';
import { HelmClient } from './tools/helm.js';
import { KustomizeClient } from './tools/kustomize.js';
import type { GeneratedChart } from './types/chart.js';
import type { RunConfig } from './types/config.js';
import type { Logger } from './utils/logger.js';
import type { Workspace } from './utils/workspace.js';

export interface ChartifyContext {
  config: RunConfig;
  runner: CommandRunner;
  logger: Logger;
  workspace: Workspace;
}

/**
 * Normalize `input` into a self-contained chart inside the workspace:
 * resolve the source, run the patch and injection pipeline, merge ad-hoc
 * dependencies and write the chart.
 */
export async function chartify(input: string, ctx: ChartifyContext): Promise<GeneratedChart> {
  const { config, runner, logger, workspace } = ctx;
  const options = config.chartify;

  const source = await detectSource(input, { repo: options.repo, version: options.chartVersion });
  logger.debug(`Detected ${source.kind} source for ${input}`);

  const resolved = await resolveSource(source, options, {
    workspace,
    helm: new HelmClient(runner, config.tools.helm, config.cluster.kubeContext),
    kustomize: new KustomizeClient(runner, config.tools.kustomize),
    logger,
    render: options.stages.length > 0,
  });

  const manifests = resolved.manifests
    ? await runPipeline(resolved.manifests, options.stages, {
        runner,
        logger,
        scratchDir: workspace.path('.scratch'),
        strict: options.strictPatches,
      })
    : undefined;

  // Rendered charts carry their subcharts' objects as plain templates.
  const base = manifests ? { ...resolved.metadata, dependencies: undefined } : resolved.metadata;
  const metadata = mergeDependencies(base, options.dependencies);

  const written = await materializeChart(resolved.chartDir, { metadata, manifests });
  logger.debug(`Wrote ${written.length} files to ${resolved.chartDir}`);

  return {
    dir: resolved.chartDir,
    metadata,
    values: options.values,
    source: resolved.source,
  };
}
