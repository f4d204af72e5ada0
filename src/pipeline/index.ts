import { availableParallelism } from 'node:os';
import { join } from 'node:path';
import { ChartifyError, DuplicateManifestError, PipelineStageError, causeMessage } from '../errors.js';
import type { CommandRunner } from '../exec/runner.js';
import type { ManifestSet } from '../types/manifest.js';
import type { PipelineStage } from '../types/pipeline.js';
import { identityKey } from '../utils/k8s-names.js';
import type { Logger } from '../utils/logger.js';
import { runInjector } from './injector.js';
import { applyJsonPatch, loadJsonPatch } from './json-patch.js';
import { applyStrategicMergePatches, loadStrategicMergePatch } from './strategic-merge.js';

export interface PipelineContext {
  runner: CommandRunner;
  logger: Logger;
  scratchDir: string;
  /** A patch target that matches nothing fails the stage instead of warning. */
  strict: boolean;
  /** Maximum concurrent injector calls. */
  concurrency?: number;
}

export function describeStage(stage: PipelineStage, index: number): string {
  const detail = stage.type === 'inject' ? stage.command.join(' ') : stage.file;
  return `#${index + 1} (${stage.type} ${detail})`;
}

function reportUnmatched(unmatched: string[], label: string, ctx: PipelineContext): void {
  for (const target of unmatched) {
    if (ctx.strict) {
      throw new PipelineStageError(label, `target ${target} matched no manifest`);
    }
    ctx.logger.warn(`Stage ${label}: target ${target} matched no manifest, skipping`);
  }
}

async function runStage(
  set: ManifestSet,
  stage: PipelineStage,
  index: number,
  ctx: PipelineContext,
): Promise<ManifestSet> {
  const label = describeStage(stage, index);

  switch (stage.type) {
    case 'inject':
      return runInjector(set, stage.command, label, {
        runner: ctx.runner,
        scratchDir: join(ctx.scratchDir, `stage-${index + 1}`),
        concurrency: ctx.concurrency ?? availableParallelism(),
      });
    case 'json-patch': {
      const entries = await loadJsonPatch(stage.file, stage.target);
      const { manifests, unmatched } = applyJsonPatch(set, entries, label);
      reportUnmatched(unmatched, label, ctx);
      return manifests;
    }
    case 'strategic-merge-patch': {
      const patches = await loadStrategicMergePatch(stage.file);
      const { manifests, unmatched } = applyStrategicMergePatches(set, patches, label);
      reportUnmatched(unmatched, label, ctx);
      return manifests;
    }
    default: {
      const unreachable: never = stage;
      throw new Error(`Unhandled pipeline stage ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Fail on two documents sharing an identity.
 */
export function assertUniqueIdentities(set: ManifestSet): void {
  const seen = new Map<string, string>();
  for (const doc of set) {
    const key = identityKey(doc.identity);
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new DuplicateManifestError(doc.identity, [previous, doc.file]);
    }
    seen.set(key, doc.file);
  }
}

/**
 * Run the stages in declaration order. Each stage sees the output of the
 * previous one; the first failure aborts the rest.
 */
export async function runPipeline(
  set: ManifestSet,
  stages: readonly PipelineStage[],
  ctx: PipelineContext,
): Promise<ManifestSet> {
  let current = set;

  for (const [index, stage] of stages.entries()) {
    ctx.logger.debug(`Running pipeline stage ${describeStage(stage, index)}`);
    try {
      current = await runStage(current, stage, index, ctx);
    } catch (err) {
      if (err instanceof ChartifyError) throw err;
      throw new PipelineStageError(describeStage(stage, index), causeMessage(err), undefined, { cause: err });
    }
  }

  assertUniqueIdentities(current);
  return current;
}
