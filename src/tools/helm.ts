import type { CommandRunner } from '../exec/runner.js';
import type { ValuesLayers } from '../types/chart.js';

export interface HelmRenderRequest {
  releaseName: string;
  chartDir: string;
  namespace?: string;
  values: ValuesLayers;
  /** Let helm resolve the chart's dependencies before rendering. */
  dependencyUpdate?: boolean;
}

export interface HelmTemplateRequest extends HelmRenderRequest {
  /** Render CRDs from every `crds/` directory, subcharts' included. */
  includeCrds?: boolean;
}

export interface HelmUpgradeRequest extends HelmRenderRequest {
  install: boolean;
  dryRun: boolean;
  timeoutSeconds: number;
}

export interface HelmPullRequest {
  reference: string;
  destination: string;
  version?: string;
  repo?: string;
}

function valuesArgs(values: ValuesLayers): string[] {
  return [
    ...values.files.flatMap((file) => ['--values', file]),
    ...values.set.flatMap((assignment) => ['--set', assignment]),
  ];
}

export class HelmClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly bin: string,
    private readonly kubeContext?: string,
  ) {}

  /** Render a chart to a multi-document manifest stream. */
  async template(request: HelmTemplateRequest): Promise<string> {
    const args = [
      'template',
      request.releaseName,
      request.chartDir,
      ...(request.namespace ? ['--namespace', request.namespace] : []),
      ...valuesArgs(request.values),
      ...(request.dependencyUpdate ? ['--dependency-update'] : []),
      ...(request.includeCrds ? ['--include-crds'] : []),
    ];
    const { stdout } = await this.runner.run({ command: this.bin, args });
    return stdout;
  }

  /** Install or upgrade a release. Resolves with helm's transcript. */
  async upgrade(request: HelmUpgradeRequest): Promise<string> {
    const args = [
      'upgrade',
      request.releaseName,
      request.chartDir,
      ...(request.install ? ['--install'] : []),
      ...(request.dryRun ? ['--dry-run'] : []),
      '--timeout',
      `${request.timeoutSeconds}s`,
      ...(request.namespace ? ['--namespace', request.namespace] : []),
      ...valuesArgs(request.values),
      ...(request.dependencyUpdate ? ['--dependency-update'] : []),
      ...(this.kubeContext ? ['--kube-context', this.kubeContext] : []),
    ];
    const { stdout } = await this.runner.run({ command: this.bin, args });
    return stdout;
  }

  /** Fetch and unpack a remote chart into `destination`. */
  async pull(request: HelmPullRequest): Promise<void> {
    const args = [
      'pull',
      request.reference,
      '--untar',
      '--untardir',
      request.destination,
      ...(request.version ? ['--version', request.version] : []),
      ...(request.repo ? ['--repo', request.repo] : []),
    ];
    await this.runner.run({ command: this.bin, args });
  }
}
