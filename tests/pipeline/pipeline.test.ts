import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { describeStage, runPipeline, type PipelineContext } from '../../src/pipeline/index.js';
import { DuplicateManifestError, PipelineStageError } from '../../src/errors.js';
import type { PipelineStage } from '../../src/types/pipeline.js';
import { createRecordingLogger, type RecordingLogger } from '../helpers/logger.js';
import { FakeRunner } from '../helpers/fake-runner.js';
import { doc, makeDeployment, makeService } from '../helpers/manifests.js';

const patchesDir = resolve(import.meta.dirname, '../fixtures/patches');

function context(overrides: Partial<PipelineContext> = {}): PipelineContext & { logger: RecordingLogger } {
  return {
    runner: new FakeRunner(),
    scratchDir: '/nonexistent-scratch',
    strict: false,
    ...overrides,
    logger: createRecordingLogger(),
  };
}

const set = [doc(makeDeployment('web'), 'deployment.yaml'), doc(makeService('web'), 'service.yaml')];

describe('runPipeline', () => {
  it('returns the set unchanged when there are no stages', async () => {
    expect(await runPipeline(set, [], context())).toBe(set);
  });

  it('runs stages in order, each on the previous output', async () => {
    const stages: PipelineStage[] = [
      { type: 'json-patch', file: resolve(patchesDir, 'replicas.json-patch.yaml') },
      { type: 'strategic-merge-patch', file: resolve(patchesDir, 'sidecar.yaml') },
    ];

    const [deployment] = await runPipeline(set, stages, context());

    expect(deployment.body.spec?.replicas).toBe(3);
    expect(deployment.body.metadata.labels).toEqual({ app: 'web', tier: 'frontend' });
    const template = deployment.body.spec?.template;
    expect(template).toMatchObject({
      spec: {
        containers: [
          { name: 'web', image: 'web:1.0' },
          { name: 'sidecar', image: 'busybox:1.36' },
        ],
      },
    });
  });

  it('gives the same output for the same input', async () => {
    const stages: PipelineStage[] = [{ type: 'strategic-merge-patch', file: resolve(patchesDir, 'sidecar.yaml') }];
    const first = await runPipeline(set, stages, context());
    const second = await runPipeline(set, stages, context());
    expect(second).toEqual(first);
  });

  it('warns about patch targets that match nothing', async () => {
    const ctx = context();
    const file = resolve(patchesDir, 'replicas.json-patch.yaml');

    await runPipeline([doc(makeService('web'))], [{ type: 'json-patch', file }], ctx);

    expect(ctx.logger.lines).toContainEqual({
      level: 'warn',
      message: `Stage #1 (json-patch ${file}): target kind=Deployment,name=web matched no manifest, skipping`,
    });
  });

  it('fails on unmatched targets in strict mode', async () => {
    const stages: PipelineStage[] = [{ type: 'strategic-merge-patch', file: resolve(patchesDir, 'sidecar.yaml') }];
    await expect(runPipeline([doc(makeService('web'))], stages, context({ strict: true }))).rejects.toThrow(
      'target Deployment/web matched no manifest',
    );
  });

  it('wraps unexpected failures with the stage that raised them', async () => {
    const stages: PipelineStage[] = [{ type: 'json-patch', file: resolve(patchesDir, 'missing.yaml') }];
    const attempt = runPipeline(set, stages, context());

    await expect(attempt).rejects.toBeInstanceOf(PipelineStageError);
    await expect(attempt).rejects.toThrow(`Pipeline stage ${describeStage(stages[0], 0)} failed`);
  });

  it('rejects two documents with the same identity', async () => {
    const duplicated = [doc(makeService('web'), 'a.yaml'), doc(makeService('web'), 'b.yaml')];
    const attempt = runPipeline(duplicated, [], context());

    await expect(attempt).rejects.toBeInstanceOf(DuplicateManifestError);
    await expect(attempt).rejects.toThrow('Duplicate manifest Service/web (v1) found in a.yaml, b.yaml');
  });
});

describe('describeStage', () => {
  it('numbers stages from one', () => {
    expect(describeStage({ type: 'inject', command: ['istioctl', 'kube-inject', '-f', 'FILE'] }, 0)).toBe(
      '#1 (inject istioctl kube-inject -f FILE)',
    );
    expect(describeStage({ type: 'strategic-merge-patch', file: 'p.yaml' }, 2)).toBe('#3 (strategic-merge-patch p.yaml)');
  });
});
