import type { CommandRunner } from '../exec/runner.js';

export class KubectlClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly bin: string,
    private readonly kubeContext?: string,
  ) {}

  private base(namespace?: string): string[] {
    return [
      ...(this.kubeContext ? ['--context', this.kubeContext] : []),
      ...(namespace ? ['--namespace', namespace] : []),
    ];
  }

  /** Namespace of the selected context, `default` when the context sets none. */
  async currentNamespace(): Promise<string> {
    const { stdout } = await this.runner.run({
      command: this.bin,
      args: [...this.base(), 'config', 'view', '--minify', '--output', 'jsonpath={..namespace}'],
    });
    return stdout.trim() || 'default';
  }

  /** `kubectl get RESOURCE -l SELECTOR -o json`, parsed. */
  async list(resource: string, selector: string, namespace?: string): Promise<unknown> {
    const { stdout } = await this.runner.run({
      command: this.bin,
      args: [...this.base(namespace), 'get', resource, '--selector', selector, '--output', 'json'],
    });
    return JSON.parse(stdout);
  }

  /** Apply a JSON merge patch to one live object named `kind/name`. */
  async mergePatch(resource: string, patch: unknown, namespace?: string): Promise<void> {
    await this.runner.run({
      command: this.bin,
      args: [
        ...this.base(namespace),
        'patch',
        resource,
        '--type',
        'merge',
        '--patch',
        JSON.stringify(patch),
      ],
    });
  }
}
