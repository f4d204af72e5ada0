import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { detectSource } from '../../src/source/detect.js';
import { SourceResolutionError } from '../../src/errors.js';

describe('detectSource', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'chartify-detect-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function dirWith(name: string, files: string[]): Promise<string> {
    const dir = join(root, name);
    await mkdir(dir);
    for (const file of files) await writeFile(join(dir, file), '');
    return dir;
  }

  it('classifies a directory with a kustomization file as an overlay', async () => {
    const dir = await dirWith('overlay', ['kustomization.yml']);
    expect(await detectSource(dir)).toEqual({ kind: 'kustomize-overlay', origin: dir, path: dir });
  });

  it('classifies a directory with Chart.yaml as a local chart', async () => {
    const dir = await dirWith('chart', ['Chart.yaml', 'values.yaml']);
    expect((await detectSource(dir)).kind).toBe('local-chart');
  });

  it('prefers the kustomization when both markers exist', async () => {
    const dir = await dirWith('both', ['Chart.yaml', 'kustomization.yaml']);
    expect((await detectSource(dir)).kind).toBe('kustomize-overlay');
  });

  it('treats any other directory as plain manifests', async () => {
    const dir = await dirWith('plain', ['app.yaml']);
    expect((await detectSource(dir)).kind).toBe('plain-directory');
  });

  it('rejects a file', async () => {
    const dir = await dirWith('files', ['app.yaml']);
    await expect(detectSource(join(dir, 'app.yaml'))).rejects.toThrow('expected a directory, got a file');
  });

  it('treats REPO/CHART as a remote chart', async () => {
    expect(await detectSource('stable/mysql', { version: '1.2.3' })).toEqual({
      kind: 'remote-chart',
      origin: { reference: 'stable/mysql', version: '1.2.3' },
      path: '',
    });
  });

  it('accepts a bare chart name only with --repo', async () => {
    const source = await detectSource('mysql', { repo: 'https://charts.example.com' });
    expect(source.kind).toBe('remote-chart');
    await expect(detectSource('mysql')).rejects.toBeInstanceOf(SourceResolutionError);
  });

  it('accepts oci references', async () => {
    expect((await detectSource('oci://registry.example.com/charts/app')).kind).toBe('remote-chart');
  });
});
