import chalk from 'chalk';
import { chartify } from '../chartify.js';
import { hasDependencies } from '../chart/metadata.js';
import { ReleaseNotFoundError, SourceResolutionError, causeMessage } from '../errors.js';
import { diffManifestSets, isHook, type DocumentChange } from '../release/diff.js';
import type { ReleaseStorage } from '../release/storage.js';
import type { K8sManifest } from '../types/k8s.js';
import type { ManifestSet } from '../types/manifest.js';
import { withWorkspace } from '../utils/workspace.js';
import { manifestToYaml, parseManifestStream } from '../utils/yaml.js';
import { helmClient, releaseStorage, type DriverContext } from './context.js';

export interface DiffResult {
  release: string;
  /** False when the release is not installed and everything diffs as added. */
  releaseExists: boolean;
  changes: DocumentChange[];
}

/** Parse `helm template` output, leaving hooks out. */
export function parseRendered(text: string, origin: string): ManifestSet {
  try {
    return parseManifestStream(text, origin).filter((doc) => !isHook(doc.body));
  } catch (err) {
    throw new SourceResolutionError(origin, 'local-chart', `unparsable manifests: ${causeMessage(err)}`, { cause: err });
  }
}

async function currentManifests(
  storage: ReleaseStorage,
  namespace: string | undefined,
  release: string,
): Promise<ManifestSet | null> {
  try {
    const record = await storage.getRelease(namespace, release);
    return parseRendered(record.manifestText, `release ${release} revision ${record.revision}`);
  } catch (err) {
    if (err instanceof ReleaseNotFoundError) return null;
    throw err;
  }
}

/**
 * Show what applying `input` as `release` would change, by comparing the
 * chart's rendered manifests with the release's stored manifest.
 */
export async function diffRelease(
  release: string,
  input: string,
  ctx: DriverContext,
  storage: ReleaseStorage = releaseStorage(ctx),
): Promise<DiffResult> {
  const { config, runner, logger } = ctx;
  const options = config.chartify;

  return withWorkspace({ logger, retain: options.debug, parent: ctx.workspaceParent }, async (workspace) => {
    const chart = await chartify(input, { config, runner, logger, workspace });
    const rendered = await helmClient(ctx).template({
      releaseName: release,
      chartDir: chart.dir,
      namespace: options.namespace,
      values: chart.values,
      dependencyUpdate: hasDependencies(chart.metadata),
    });
    const desired = parseRendered(rendered, chart.dir);

    const current = await currentManifests(storage, options.namespace, release);
    if (!current) {
      logger.info(`Release ${release} is not installed; every manifest would be added`);
    }

    return {
      release,
      releaseExists: current !== null,
      changes: diffManifestSets(current ?? [], desired),
    };
  });
}

function header(change: DocumentChange): string {
  const { identity } = change;
  const ns = identity.namespace || 'default';
  const verb = { added: 'has been added', removed: 'has been removed', changed: 'has changed' }[change.type];
  return `${ns}, ${identity.name}, ${identity.kind} (${identity.apiVersion}) ${verb}:`;
}

function colorLine(line: string, color: boolean): string {
  if (!color) return line;
  if (line.startsWith('+') && !line.startsWith('+++')) return chalk.green(line);
  if (line.startsWith('-') && !line.startsWith('---')) return chalk.red(line);
  if (line.startsWith('@@')) return chalk.cyan(line);
  return line;
}

function changeLines(change: DocumentChange): string[] {
  switch (change.type) {
    case 'added':
      return prefixedLines(change.desired, '+ ');
    case 'removed':
      return prefixedLines(change.current, '- ');
    case 'changed':
      // Drop the Index/===/---/+++ file header lines of the unified diff.
      return change.patch.split('\n').filter((l) => l && !/^(Index:|=+$|---|\+\+\+)/.test(l));
  }
}

/**
 * Render changes as text in the layout `helm diff` uses: a header per
 * object followed by its YAML with +/- markers.
 */
export function formatChanges(changes: DocumentChange[], options: { color?: boolean } = {}): string {
  const color = options.color ?? false;
  return changes
    .map((change) => {
      const title = color ? chalk.yellow(header(change)) : header(change);
      return [title, ...changeLines(change).map((l) => colorLine(l, color))].join('\n');
    })
    .join('\n\n');
}

function prefixedLines(manifest: K8sManifest, prefix: string): string[] {
  return manifestToYaml(manifest)
    .trimEnd()
    .split('\n')
    .map((l) => `${prefix}${l}`);
}
