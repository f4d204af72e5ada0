import { ExecFileRunner } from '../exec/runner.js';
import { adoptResources } from '../drivers/adopt.js';
import { kubectlClient } from '../drivers/context.js';
import { createLogger } from '../utils/logger.js';
import { buildRunConfig, clusterFlags, runCommand, type ClusterCommandOptions } from './options.js';

export async function adopt(release: string, resources: string[], options: ClusterCommandOptions): Promise<void> {
  const debug = options.debug ?? false;
  const logger = createLogger({ verbose: debug });

  await runCommand(logger, debug, async () => {
    const config = await buildRunConfig(release, clusterFlags(options), options.config);
    const adopted = await adoptResources(
      kubectlClient({ config, runner: new ExecFileRunner(logger), logger }),
      {
        release,
        namespace: config.chartify.namespace,
        resources,
      },
      logger,
    );
    logger.success(`Adopted ${adopted.join(', ')} into release ${release}`);
  });
}
