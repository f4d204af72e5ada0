import type { CommandRunner } from '../exec/runner.js';

export class KustomizeClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly bin: string,
  ) {}

  /** Run `kustomize build` inside the overlay directory. */
  async build(overlayDir: string): Promise<string> {
    const { stdout } = await this.runner.run({
      command: this.bin,
      args: ['build', '.'],
      cwd: overlayDir,
    });
    return stdout;
  }
}
