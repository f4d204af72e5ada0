import type { ChartMetadata } from './chart.js';
import type { ManifestSet } from './manifest.js';

export type SourceVariant =
  | 'plain-directory'
  | 'kustomize-overlay'
  | 'local-chart'
  | 'remote-chart';

export interface RemoteChartCoordinate {
  reference: string;
  repo?: string;
  version?: string;
}

export type ManifestSource =
  | { kind: 'plain-directory'; origin: string; path: string }
  | { kind: 'kustomize-overlay'; origin: string; path: string }
  | { kind: 'local-chart'; origin: string; path: string }
  | { kind: 'remote-chart'; origin: RemoteChartCoordinate; path: string };

export interface ResolvedSource {
  source: ManifestSource;
  /** Chart directory inside the workspace. */
  chartDir: string;
  metadata: ChartMetadata;
  /**
   * Raw manifest set. Absent for a chart that is materialized unrendered
   * because no pipeline stage needs concrete YAML.
   */
  manifests?: ManifestSet;
}
