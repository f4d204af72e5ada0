import { describe, it, expect } from 'vitest';
import { configFileSchema } from '../../src/config/schema.js';

describe('configFileSchema', () => {
  it('fills defaults for an empty file', () => {
    expect(configFileSchema.parse({})).toEqual({
      values: [],
      set: [],
      pipeline: [],
      dependencies: [],
      tools: {},
      storage: {},
    });
  });

  it('reads numeric versions as strings', () => {
    expect(configFileSchema.parse({ version: 2 }).version).toBe('2');
  });

  it('accepts every stage type', () => {
    const parsed = configFileSchema.parse({
      pipeline: [
        { type: 'inject', command: ['linkerd', 'inject', 'FILE'] },
        { type: 'json-patch', file: 'p.yaml', target: { kind: 'Deployment' } },
        { type: 'strategic-merge-patch', file: 's.yaml' },
      ],
    });
    expect(parsed.pipeline.map((s) => s.type)).toEqual(['inject', 'json-patch', 'strategic-merge-patch']);
  });

  it('rejects unknown stage types', () => {
    expect(configFileSchema.safeParse({ pipeline: [{ type: 'kustomize', file: 'x' }] }).success).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(configFileSchema.safeParse({ namepsace: 'typo' }).success).toBe(false);
  });

  it('rejects an unknown storage driver', () => {
    expect(configFileSchema.safeParse({ storage: { driver: 'sql' } }).success).toBe(false);
  });
});
