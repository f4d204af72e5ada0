import { ExecFileRunner } from '../exec/runner.js';
import { releaseStorage } from '../drivers/context.js';
import { dumpRelease } from '../drivers/dump.js';
import { createLogger } from '../utils/logger.js';
import { buildRunConfig, clusterFlags, runCommand, type ClusterCommandOptions } from './options.js';

export interface DumpOptions extends ClusterCommandOptions {
  revision?: number;
}

export async function dump(release: string, options: DumpOptions): Promise<void> {
  const debug = options.debug ?? false;
  const logger = createLogger({ verbose: debug, stream: 'stderr' });

  await runCommand(logger, debug, async () => {
    const config = await buildRunConfig(release, clusterFlags(options), options.config);
    const storage = releaseStorage({ config, runner: new ExecFileRunner(logger), logger });
    process.stdout.write(
      await dumpRelease(storage, { release, namespace: config.chartify.namespace, revision: options.revision }),
    );
  });
}
