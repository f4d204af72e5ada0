import { chartify } from '../chartify.js';
import { hasDependencies } from '../chart/metadata.js';
import { releaseStorageObject, renderManifestText } from '../release/object.js';
import type { StorageDriver } from '../types/config.js';
import { withWorkspace } from '../utils/workspace.js';
import { manifestToYaml } from '../utils/yaml.js';
import { helmClient, type DriverContext } from './context.js';
import { parseRendered } from './diff.js';

export interface TemplateRequest {
  /**
   * Print the result as a complete release: hooks removed and the storage
   * object `helm install` would create appended.
   */
  releaseObject?: StorageDriver;
}

/**
 * Chartify `input` and render it. Never touches the cluster.
 *
 * @returns the rendered manifest stream
 */
export async function renderTemplate(
  input: string,
  ctx: DriverContext,
  request: TemplateRequest = {},
): Promise<string> {
  const { config, runner, logger } = ctx;
  const options = config.chartify;

  return withWorkspace({ logger, retain: options.debug, parent: ctx.workspaceParent }, async (workspace) => {
    const chart = await chartify(input, { config, runner, logger, workspace });
    const rendered = await helmClient(ctx).template({
      releaseName: options.releaseName,
      chartDir: chart.dir,
      namespace: options.namespace,
      values: chart.values,
      dependencyUpdate: hasDependencies(chart.metadata),
    });
    if (!request.releaseObject) return rendered;

    const manifests = parseRendered(rendered, chart.dir);
    const storage = releaseStorageObject({
      release: options.releaseName,
      // helm template renders into `default` unless told otherwise
      namespace: options.namespace ?? 'default',
      chart: chart.metadata,
      manifests,
      driver: request.releaseObject,
    });
    logger.debug(`Appending release ${storage.kind} ${storage.metadata.name}`);
    return `${renderManifestText(manifests)}---\n${manifestToYaml(storage)}`;
  });
}
