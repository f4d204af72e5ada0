import type { CommandRunner } from '../exec/runner.js';
import { KubectlReleaseStorage, type ReleaseStorage } from '../release/storage.js';
import { HelmClient } from '../tools/helm.js';
import { KubectlClient } from '../tools/kubectl.js';
import type { RunConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';

/** What every operation driver is handed by its command. */
export interface DriverContext {
  config: RunConfig;
  runner: CommandRunner;
  logger: Logger;
  /** Parent directory for workspaces, defaults to the OS temp dir. */
  workspaceParent?: string;
}

export function helmClient(ctx: DriverContext): HelmClient {
  return new HelmClient(ctx.runner, ctx.config.tools.helm, ctx.config.cluster.kubeContext);
}

export function kubectlClient(ctx: DriverContext): KubectlClient {
  return new KubectlClient(ctx.runner, ctx.config.tools.kubectl, ctx.config.cluster.kubeContext);
}

export function releaseStorage(ctx: DriverContext): ReleaseStorage {
  return new KubectlReleaseStorage(kubectlClient(ctx), ctx.config.cluster.storageDriver);
}
