import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import {
  addChartifyOptions,
  orderedStages,
  parsePositiveInt,
  parseStorageDriver,
  toCliFlags,
  type ChartifyCommandOptions,
} from '../../src/commands/options.js';

function parse(args: string[]): ChartifyCommandOptions {
  const command = addChartifyOptions(new Command('test'))
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  command.parse(args, { from: 'user' });
  return command.opts<ChartifyCommandOptions>();
}

describe('addChartifyOptions', () => {
  it('keeps stage order across different stage flags', () => {
    const options = parse([
      '--strategic-merge-patch',
      'a.yaml',
      '--inject',
      'linkerd inject FILE',
      '--json-patch',
      'b.yaml',
      '--injector',
      'istioctl kube-inject,f=FILE',
      '--strategic-merge-patch',
      'c.yaml',
    ]);

    expect(orderedStages(options)).toEqual([
      { type: 'strategic-merge-patch', file: 'a.yaml' },
      { type: 'inject', command: ['linkerd', 'inject', 'FILE'] },
      { type: 'json-patch', file: 'b.yaml' },
      { type: 'inject', command: ['istioctl', 'kube-inject', '--f=FILE'] },
      { type: 'strategic-merge-patch', file: 'c.yaml' },
    ]);
  });

  it('collects repeatable flags', () => {
    const flags = toCliFlags(
      parse(['-f', 'a.yaml', '--values', 'b.yaml', '--set', 'x=1', '--adhoc-dependency', 'mydb=stable/mysql', '-n', 'prod']),
    );

    expect(flags).toMatchObject({
      namespace: 'prod',
      values: ['a.yaml', 'b.yaml'],
      set: ['x=1'],
      dependencies: ['mydb=stable/mysql'],
      stages: [],
    });
  });

  it('rejects an injector without the FILE placeholder', () => {
    expect(() => parse(['--inject', 'linkerd inject'])).toThrow('must reference the manifest file as FILE');
  });
});

describe('argument parsers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('300')).toBe(300);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
    expect(() => parsePositiveInt('abc')).toThrow('Expected a positive integer.');
  });

  it('parses storage drivers', () => {
    expect(parseStorageDriver('configmap')).toBe('configmap');
    expect(() => parseStorageDriver('memory')).toThrow('Expected one of secret, configmap.');
  });
});
