import { mkdtemp, rm } from 'node:fs/promises';
import { rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { causeMessage } from '../errors.js';
import type { Logger } from './logger.js';

/** A temporary directory owned by exactly one operation. */
export interface Workspace {
  readonly root: string;
  path(...segments: string[]): string;
}

export interface WorkspaceOptions {
  logger: Logger;
  /** Leave the directory in place after the operation. */
  retain?: boolean;
  prefix?: string;
  /** Parent directory, defaults to the OS temp dir. */
  parent?: string;
}

/**
 * Acquire a workspace, run `fn`, and release the workspace on every exit
 * path: success, error, and SIGINT/SIGTERM. Removal failures are logged and
 * never replace the operation's own outcome.
 */
export async function withWorkspace<T>(
  options: WorkspaceOptions,
  fn: (workspace: Workspace) => Promise<T>,
): Promise<T> {
  const { logger } = options;
  const root = await mkdtemp(join(options.parent ?? tmpdir(), options.prefix ?? 'chartify-'));
  const workspace: Workspace = {
    root,
    path: (...segments) => join(root, ...segments),
  };
  logger.debug(`Workspace created at ${root}`);

  const onSignal = (signal: NodeJS.Signals) => {
    if (!options.retain) {
      try {
        rmSync(root, { recursive: true, force: true });
      } catch (err) {
        logger.warn(`Could not remove ${root}: ${causeMessage(err)}`);
      }
    }
    process.exit(signal === 'SIGTERM' ? 143 : 130);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await fn(workspace);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (options.retain) {
      logger.info(`Helm chart has been written to ${root} for you to see. Please remove it afterwards.`);
    } else {
      await releaseWorkspace(root, logger);
    }
  }
}

async function releaseWorkspace(root: string, logger: Logger): Promise<void> {
  try {
    await rm(root, { recursive: true, force: true });
    logger.debug(`Workspace ${root} removed`);
  } catch (err) {
    logger.warn(`Could not remove ${root}: ${causeMessage(err)}`);
  }
}
