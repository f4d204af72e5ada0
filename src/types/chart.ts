import type { ManifestSource } from './source.js';

export interface ChartDependency {
  name: string;
  version?: string;
  repository?: string;
  alias?: string;
  condition?: string;
  [key: string]: unknown;
}

export interface ChartMetadata {
  apiVersion: string;
  name: string;
  version: string;
  appVersion?: string;
  description?: string;
  dependencies?: ChartDependency[];
  [key: string]: unknown;
}

export interface DependencySpec {
  alias: string;
  repository: string;
  chart: string;
  version: string;
}

/** Values passed to helm, files first, `--set` overrides last. */
export interface ValuesLayers {
  files: readonly string[];
  set: readonly string[];
}

export interface GeneratedChart {
  dir: string;
  metadata: ChartMetadata;
  values: ValuesLayers;
  source: ManifestSource;
}
