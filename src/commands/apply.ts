import { ExecFileRunner } from '../exec/runner.js';
import { applyRelease } from '../drivers/apply.js';
import { createLogger } from '../utils/logger.js';
import { buildRunConfig, runCommand, toCliFlags, type ChartifyCommandOptions } from './options.js';

export interface ApplyOptions extends ChartifyCommandOptions {
  install?: boolean;
  dryRun?: boolean;
  timeout: number;
  adopt: string[];
}

export async function apply(release: string, chart: string, options: ApplyOptions): Promise<void> {
  const debug = options.debug ?? false;
  const logger = createLogger({ verbose: debug });

  await runCommand(logger, debug, async () => {
    const config = await buildRunConfig(release, toCliFlags(options), options.config);
    const transcript = await applyRelease(
      {
        release,
        input: chart,
        install: options.install ?? false,
        dryRun: options.dryRun ?? false,
        timeoutSeconds: options.timeout,
        adopt: options.adopt,
      },
      { config, runner: new ExecFileRunner(logger), logger },
    );
    if (transcript.trim()) console.log(transcript.trimEnd());
    logger.success(options.dryRun ? `Release ${release} checked (dry run)` : `Release ${release} is up to date`);
  });
}
