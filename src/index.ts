#!/usr/bin/env node
import { Command } from 'commander';
import { adopt } from './commands/adopt.js';
import { apply } from './commands/apply.js';
import { diff } from './commands/diff.js';
import { dump } from './commands/dump.js';
import {
  addChartifyOptions,
  addClusterOptions,
  parsePositiveInt,
  parseStorageDriver,
} from './commands/options.js';
import { template } from './commands/template.js';

const DEFAULT_TIMEOUT_SECONDS = 300;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('chartify')
  .description('Turn Kubernetes manifests, kustomizations and charts into Helm releases')
  .version('0.1.0')
  .enablePositionalOptions();

function releaseCommand(name: string, description: string): Command {
  return addChartifyOptions(
    program
      .command(name)
      .description(description)
      .argument('<release>', 'Release name')
      .argument('<chart>', 'Manifest directory, kustomization, chart directory or chart reference'),
  )
    .option('--timeout <seconds>', 'Time to wait for any individual Kubernetes operation', parsePositiveInt, DEFAULT_TIMEOUT_SECONDS)
    .option('--dry-run', 'Simulate the upgrade')
    .option('--adopt <kind/name>', 'Adopt an existing object into the release first (repeatable)', collect, []);
}

releaseCommand('apply', 'Install or upgrade a release from a chart or manifests')
  .option('--no-install', 'Fail when the release does not exist yet')
  .action(apply);

releaseCommand('upgrade', 'Upgrade a release from a chart or manifests')
  .option('--install', 'Install the release when it does not exist yet')
  .action(apply);

addChartifyOptions(
  program
    .command('diff')
    .description('Show what applying a chart or manifests would change in a release')
    .argument('<release>', 'Release name')
    .argument('<chart>', 'Manifest directory, kustomization, chart directory or chart reference'),
)
  .option('--detailed-exitcode', 'Exit with code 2 when there are changes')
  .action(diff);

addChartifyOptions(
  program
    .command('template')
    .description('Render a chart or manifests locally')
    .argument('<chart>', 'Manifest directory, kustomization, chart directory or chart reference'),
)
  .option('--name <release>', 'Release name used for rendering', 'release-name')
  .option('--include-release-secret', 'Drop hooks and append the release Secret helm install would create')
  .option('--include-release-configmap', 'Drop hooks and append the release ConfigMap helm install would create')
  .action(template);

addClusterOptions(
  program
    .command('adopt')
    .description('Mark existing objects as owned by a release')
    .argument('<release>', 'Release name')
    .argument('<resources...>', 'Objects as KIND/NAME, e.g. configmap/foo'),
).action(adopt);

addClusterOptions(
  program
    .command('dump')
    .description('Print the stored state of a release')
    .argument('<release>', 'Release name'),
)
  .option('--revision <n>', 'Revision to print instead of the latest', parsePositiveInt)
  .option('--storage-driver <driver>', 'Where helm stores releases: secret or configmap', parseStorageDriver)
  .action(dump);

await program.parseAsync();
