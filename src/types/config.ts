import type { DependencySpec, ValuesLayers } from './chart.js';
import type { PipelineStage } from './pipeline.js';

export interface ToolPaths {
  helm: string;
  kubectl: string;
  kustomize: string;
}

export type StorageDriver = 'secret' | 'configmap';

export interface ChartifyOptions {
  readonly releaseName: string;
  readonly namespace?: string;
  /** Chart version for generated charts, or the version to fetch for remote charts. */
  readonly chartVersion?: string;
  /** Repository URL for remote chart references. */
  readonly repo?: string;
  readonly values: ValuesLayers;
  readonly stages: readonly PipelineStage[];
  readonly dependencies: readonly DependencySpec[];
  readonly strictPatches: boolean;
  /** Keep the workspace after the operation and log more. */
  readonly debug: boolean;
}

export interface ClusterOptions {
  readonly kubeContext?: string;
  readonly storageDriver: StorageDriver;
}

/** Everything one invocation needs, built once from flags and config file. */
export interface RunConfig {
  readonly chartify: ChartifyOptions;
  readonly tools: Readonly<ToolPaths>;
  readonly cluster: ClusterOptions;
}
