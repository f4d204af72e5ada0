export interface ReleaseChartInfo {
  name: string;
  version: string;
  appVersion?: string;
}

export interface ReleaseRecord {
  name: string;
  namespace: string;
  revision: number;
  status: string;
  chart?: ReleaseChartInfo;
  manifestText: string;
  config: Record<string, unknown>;
}
