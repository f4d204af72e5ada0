import { ExecFileRunner } from '../exec/runner.js';
import { diffRelease, formatChanges } from '../drivers/diff.js';
import { summarizeChanges } from '../release/diff.js';
import { createLogger } from '../utils/logger.js';
import { buildRunConfig, runCommand, toCliFlags, type ChartifyCommandOptions } from './options.js';

export interface DiffOptions extends ChartifyCommandOptions {
  detailedExitcode?: boolean;
}

/** Exit code of `--detailed-exitcode` when there are changes. */
export const CHANGES_EXIT_CODE = 2;

export async function diff(release: string, chart: string, options: DiffOptions): Promise<void> {
  const debug = options.debug ?? false;
  const logger = createLogger({ verbose: debug });

  await runCommand(logger, debug, async () => {
    const config = await buildRunConfig(release, toCliFlags(options), options.config);
    const result = await diffRelease(release, chart, { config, runner: new ExecFileRunner(logger), logger });

    if (result.changes.length === 0) {
      logger.success(`No changes to release ${release}`);
      return;
    }

    console.log(formatChanges(result.changes, { color: Boolean(process.stdout.isTTY) }));
    const { added, changed, removed } = summarizeChanges(result.changes);
    logger.info(`${added} to add, ${changed} to change, ${removed} to remove`);
    if (options.detailedExitcode) process.exitCode = CHANGES_EXIT_CODE;
  });
}
