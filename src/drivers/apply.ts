import { chartify } from '../chartify.js';
import { hasDependencies } from '../chart/metadata.js';
import { withWorkspace } from '../utils/workspace.js';
import { adoptResources } from './adopt.js';
import { helmClient, kubectlClient, type DriverContext } from './context.js';

export interface ApplyRequest {
  release: string;
  input: string;
  /** Install the release when it does not exist yet. */
  install: boolean;
  dryRun: boolean;
  timeoutSeconds: number;
  /** Existing `kind/name` objects to adopt before upgrading. */
  adopt: string[];
}

/**
 * Chartify `input` and install or upgrade the release from it.
 *
 * @returns helm's transcript
 */
export async function applyRelease(request: ApplyRequest, ctx: DriverContext): Promise<string> {
  const { config, runner, logger } = ctx;
  const options = config.chartify;

  return withWorkspace({ logger, retain: options.debug, parent: ctx.workspaceParent }, async (workspace) => {
    const chart = await chartify(request.input, { config, runner, logger, workspace });
    logger.step(`Generated chart ${chart.metadata.name} ${chart.metadata.version} from ${chart.source.kind}`);

    if (request.adopt.length > 0) {
      const adopted = await adoptResources(
        kubectlClient(ctx),
        {
          release: request.release,
          namespace: options.namespace,
          resources: request.adopt,
        },
        logger,
      );
      logger.step(`Adopted ${adopted.length} resources into ${request.release}`);
    }

    return helmClient(ctx).upgrade({
      releaseName: request.release,
      chartDir: chart.dir,
      namespace: options.namespace,
      values: chart.values,
      dependencyUpdate: hasDependencies(chart.metadata),
      install: request.install,
      dryRun: request.dryRun,
      timeoutSeconds: request.timeoutSeconds,
    });
  });
}
