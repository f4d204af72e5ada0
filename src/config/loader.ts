import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ANY_VERSION, normalizeRepository, parseDependencySpec } from '../chart/dependencies.js';
import { ConfigurationError, causeMessage } from '../errors.js';
import { parseInjectCommand, requirePlaceholder } from '../pipeline/injector.js';
import type { DependencySpec } from '../types/chart.js';
import type { RunConfig, StorageDriver, ToolPaths } from '../types/config.js';
import type { PipelineStage } from '../types/pipeline.js';
import { configFileSchema, type ConfigDependency, type ConfigFile, type ConfigStage } from './schema.js';

export const DEFAULT_TOOLS: Readonly<ToolPaths> = {
  helm: 'helm',
  kubectl: 'kubectl',
  kustomize: 'kustomize',
};

/** Environment variables that override the collaborator binaries. */
export const TOOL_ENV = {
  helm: 'HELM_BIN',
  kubectl: 'KUBECTL_BIN',
  kustomize: 'KUSTOMIZE_BIN',
} as const;

/** Options gathered from the command line, before merging with a config file. */
export interface CliFlags {
  namespace?: string;
  version?: string;
  repo?: string;
  kubeContext?: string;
  values: string[];
  set: string[];
  /** Stages in command line order. */
  stages: PipelineStage[];
  dependencies: string[];
  strictPatches?: boolean;
  debug?: boolean;
  storageDriver?: StorageDriver;
}

export interface LoadedConfig {
  file: ConfigFile;
  /** Directory relative paths in the file resolve against. */
  dir: string;
}

/**
 * Load and validate a YAML config file.
 */
export async function loadConfigFile(configPath: string): Promise<LoadedConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${causeMessage(err)}`, { cause: err });
  }

  try {
    const parsed: unknown = parseYaml(raw);
    return { file: configFileSchema.parse(parsed ?? {}), dir: dirname(resolve(configPath)) };
  } catch (err) {
    throw new ConfigurationError(`Invalid config file ${configPath}: ${causeMessage(err)}`, { cause: err });
  }
}

function isRemote(path: string): boolean {
  return /^https?:\/\//.test(path);
}

function resolvePath(base: string, path: string): string {
  return isRemote(path) || isAbsolute(path) ? path : resolve(base, path);
}

function stageFromConfig(stage: ConfigStage, dir: string): PipelineStage {
  switch (stage.type) {
    case 'inject':
      return {
        type: 'inject',
        command: typeof stage.command === 'string' ? parseInjectCommand(stage.command) : requirePlaceholder([...stage.command]),
      };
    case 'json-patch':
      return { type: 'json-patch', file: resolvePath(dir, stage.file), ...(stage.target ? { target: stage.target } : {}) };
    case 'strategic-merge-patch':
      return { type: 'strategic-merge-patch', file: resolvePath(dir, stage.file) };
  }
}

function dependencyFromConfig(dep: ConfigDependency): DependencySpec {
  if (typeof dep === 'string') return parseDependencySpec(dep);
  return {
    alias: dep.alias ?? dep.chart,
    repository: normalizeRepository(dep.repository),
    chart: dep.chart,
    version: dep.version ?? ANY_VERSION,
  };
}

function resolveStageFiles(stage: PipelineStage, cwd: string): PipelineStage {
  return stage.type === 'inject' ? stage : { ...stage, file: resolvePath(cwd, stage.file) };
}

/**
 * Merge command line flags over an optional config file into the frozen
 * configuration of one invocation. Scalars from the command line win; lists
 * from the command line are appended to the file's.
 */
export function resolveRunConfig(
  releaseName: string,
  flags: CliFlags,
  loaded: LoadedConfig | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): RunConfig {
  const file = loaded?.file ?? configFileSchema.parse({});
  const dir = loaded?.dir ?? cwd;

  const tools = {
    helm: env[TOOL_ENV.helm] || file.tools.helm || DEFAULT_TOOLS.helm,
    kubectl: env[TOOL_ENV.kubectl] || file.tools.kubectl || DEFAULT_TOOLS.kubectl,
    kustomize: env[TOOL_ENV.kustomize] || file.tools.kustomize || DEFAULT_TOOLS.kustomize,
  };

  const namespace = flags.namespace ?? file.namespace;
  const chartVersion = flags.version ?? file.version;
  const repo = flags.repo ?? file.repo;
  const kubeContext = flags.kubeContext ?? file.kubeContext;

  const config: RunConfig = {
    chartify: Object.freeze({
      releaseName,
      ...(namespace ? { namespace } : {}),
      ...(chartVersion ? { chartVersion } : {}),
      ...(repo ? { repo } : {}),
      values: Object.freeze({
        files: Object.freeze([
          ...file.values.map((p) => resolvePath(dir, p)),
          ...flags.values.map((p) => resolvePath(cwd, p)),
        ]),
        set: Object.freeze([...file.set, ...flags.set]),
      }),
      stages: Object.freeze([
        ...file.pipeline.map((stage) => stageFromConfig(stage, dir)),
        ...flags.stages.map((stage) => resolveStageFiles(stage, cwd)),
      ]),
      dependencies: Object.freeze([
        ...file.dependencies.map(dependencyFromConfig),
        ...flags.dependencies.map(parseDependencySpec),
      ]),
      strictPatches: flags.strictPatches ?? file.strictPatches ?? false,
      debug: flags.debug ?? false,
    }),
    tools: Object.freeze(tools),
    cluster: Object.freeze({
      ...(kubeContext ? { kubeContext } : {}),
      storageDriver: flags.storageDriver ?? file.storage.driver ?? 'secret',
    }),
  };

  return Object.freeze(config);
}
