import { Command, InvalidArgumentError } from 'commander';
import { loadConfigFile, resolveRunConfig, type CliFlags } from '../config/loader.js';
import { storageDriverSchema } from '../config/schema.js';
import { ChartifyError, causeMessage } from '../errors.js';
import { parseInjectCommand, parseLegacyInjector } from '../pipeline/injector.js';
import type { RunConfig, StorageDriver } from '../types/config.js';
import type { PipelineStage } from '../types/pipeline.js';
import type { Logger } from '../utils/logger.js';

interface OrderedStage {
  seq: number;
  stage: PipelineStage;
}

/** Options every command that builds a chart accepts. */
export type ChartifyCommandOptions = {
  inject: OrderedStage[];
  injector: OrderedStage[];
  jsonPatch: OrderedStage[];
  strategicMergePatch: OrderedStage[];
  strictPatches?: boolean;
  adhocDependency: string[];
  values: string[];
  set: string[];
  namespace?: string;
  version?: string;
  repo?: string;
  kubeContext?: string;
  config?: string;
  debug?: boolean;
};

/** Options of commands that only talk to the cluster. */
export interface ClusterCommandOptions {
  namespace?: string;
  kubeContext?: string;
  storageDriver?: StorageDriver;
  config?: string;
  debug?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseStorageDriver(value: string): StorageDriver {
  const parsed = storageDriverSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of ${storageDriverSchema.options.join(', ')}.`);
  }
  return parsed.data;
}

/**
 * Register the chart building options on `command`. The four stage flags
 * share one sequence so the pipeline runs in command line order, whichever
 * flags the stages came from.
 */
export function addChartifyOptions(command: Command): Command {
  const sequence = { next: 0 };
  const stage = (parse: (value: string) => PipelineStage) => (value: string, previous: OrderedStage[]) => {
    try {
      return [...previous, { seq: sequence.next++, stage: parse(value) }];
    } catch (err) {
      throw new InvalidArgumentError(causeMessage(err));
    }
  };

  return command
    .option(
      '--inject <command>',
      'Run each manifest file through an injector, e.g. "istioctl kube-inject -f FILE" (repeatable)',
      stage((v) => ({ type: 'inject', command: parseInjectCommand(v) })),
      [],
    )
    .option(
      '--injector <spec>',
      'DEPRECATED: injector as CMD SUBCMD,FLAG=FILE (repeatable)',
      stage((v) => ({ type: 'inject', command: parseLegacyInjector(v) })),
      [],
    )
    .option(
      '--json-patch <file>',
      'Apply a JSON patch file of {target, patch} entries (repeatable)',
      stage((file) => ({ type: 'json-patch', file })),
      [],
    )
    .option(
      '--strategic-merge-patch <file>',
      'Apply a strategic merge patch file (repeatable)',
      stage((file) => ({ type: 'strategic-merge-patch', file })),
      [],
    )
    .option('--strict-patches', 'Fail when a patch target matches no manifest')
    .option(
      '--adhoc-dependency <dep>',
      'Add a chart dependency as ALIAS=REPO/CHART:VERSION (repeatable)',
      collect,
      [],
    )
    .option('-f, --values <file>', 'Values file passed to helm (repeatable)', collect, [])
    .option('--set <key=value>', 'Value passed to helm (repeatable)', collect, [])
    .option('-n, --namespace <ns>', 'Kubernetes namespace of the release')
    .option('--version <version>', 'Version of the chart to fetch, or of the generated chart')
    .option('--repo <url>', 'Chart repository URL for remote chart references')
    .option('--kube-context <name>', 'kubeconfig context to use')
    .option('-c, --config <path>', 'Path to a chartify config file')
    .option('--debug', 'Log every command and keep the temporary chart');
}

export function addClusterOptions(command: Command): Command {
  return command
    .option('-n, --namespace <ns>', 'Kubernetes namespace of the release')
    .option('--kube-context <name>', 'kubeconfig context to use')
    .option('-c, --config <path>', 'Path to a chartify config file')
    .option('--debug', 'Log every command');
}

/** Stages from every stage flag, in the order they were given. */
export function orderedStages(options: ChartifyCommandOptions): PipelineStage[] {
  return [...options.inject, ...options.injector, ...options.jsonPatch, ...options.strategicMergePatch]
    .sort((a, b) => a.seq - b.seq)
    .map((entry) => entry.stage);
}

export function toCliFlags(options: ChartifyCommandOptions): CliFlags {
  return {
    namespace: options.namespace,
    version: options.version,
    repo: options.repo,
    kubeContext: options.kubeContext,
    values: options.values,
    set: options.set,
    stages: orderedStages(options),
    dependencies: options.adhocDependency,
    strictPatches: options.strictPatches,
    debug: options.debug,
  };
}

export async function buildRunConfig(releaseName: string, flags: CliFlags, configPath?: string): Promise<RunConfig> {
  const loaded = configPath ? await loadConfigFile(configPath) : undefined;
  return resolveRunConfig(releaseName, flags, loaded);
}

export function clusterFlags(options: ClusterCommandOptions): CliFlags {
  return {
    namespace: options.namespace,
    kubeContext: options.kubeContext,
    storageDriver: options.storageDriver,
    debug: options.debug,
    values: [],
    set: [],
    stages: [],
    dependencies: [],
  };
}

/**
 * Run a command's action, reporting failures without usage text and
 * setting a failing exit code.
 */
export async function runCommand(logger: Logger, debug: boolean, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    logger.error(causeMessage(err));
    if (debug && err instanceof Error) {
      if (err.cause !== undefined) logger.debug(`Caused by: ${causeMessage(err.cause)}`);
      if (!(err instanceof ChartifyError) && err.stack) logger.debug(err.stack);
    }
    process.exitCode = 1;
  }
}
