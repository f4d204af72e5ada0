import { ExecFileRunner } from '../exec/runner.js';
import { renderTemplate } from '../drivers/template.js';
import { ConfigurationError } from '../errors.js';
import type { StorageDriver } from '../types/config.js';
import { createLogger } from '../utils/logger.js';
import { buildRunConfig, runCommand, toCliFlags, type ChartifyCommandOptions } from './options.js';

export interface TemplateOptions extends ChartifyCommandOptions {
  name: string;
  includeReleaseSecret?: boolean;
  includeReleaseConfigmap?: boolean;
}

function releaseObjectDriver(options: TemplateOptions): StorageDriver | undefined {
  if (options.includeReleaseSecret && options.includeReleaseConfigmap) {
    throw new ConfigurationError('Use only one of --include-release-secret and --include-release-configmap');
  }
  if (options.includeReleaseSecret) return 'secret';
  if (options.includeReleaseConfigmap) return 'configmap';
  return undefined;
}

export async function template(chart: string, options: TemplateOptions): Promise<void> {
  const debug = options.debug ?? false;
  // stdout carries the manifests
  const logger = createLogger({ verbose: debug, stream: 'stderr' });

  await runCommand(logger, debug, async () => {
    const releaseObject = releaseObjectDriver(options);
    const config = await buildRunConfig(options.name, toCliFlags(options), options.config);
    const rendered = await renderTemplate(
      chart,
      { config, runner: new ExecFileRunner(logger), logger },
      { releaseObject },
    );
    process.stdout.write(rendered);
  });
}
