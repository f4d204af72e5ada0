/** Absent fields match any document. */
export interface TargetSelector {
  group?: string;
  version?: string;
  kind?: string;
  name?: string;
  namespace?: string;
}

export type PipelineStage =
  | { type: 'inject'; command: string[] }
  | { type: 'json-patch'; file: string; target?: TargetSelector }
  | { type: 'strategic-merge-patch'; file: string };
