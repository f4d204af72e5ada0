import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { ConfigurationError, PipelineStageError, causeMessage } from '../errors.js';
import type { CommandRunner } from '../exec/runner.js';
import type { ManifestDocument, ManifestSet } from '../types/manifest.js';
import { identityKey } from '../utils/k8s-names.js';
import { mapWithConcurrency } from '../utils/pool.js';
import { manifestsToMultiDoc, parseManifestStream } from '../utils/yaml.js';

/** Placeholder replaced by the path of the manifest file being injected. */
export const FILE_PLACEHOLDER = 'FILE';

/**
 * Split a command line into words, honouring single and double quotes and
 * backslash escapes.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < line.length) {
        current += line[++i];
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < line.length) {
      current += line[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) throw new ConfigurationError(`Unterminated quote in "${line}"`);
  if (inWord) words.push(current);
  return words;
}

/** Check an injector argv names a command and passes it the FILE placeholder. */
export function requirePlaceholder(argv: string[], raw: string = argv.join(' ')): string[] {
  if (argv.length === 0) {
    throw new ConfigurationError('Injector command is empty');
  }
  if (!argv.slice(1).some((arg) => arg.includes(FILE_PLACEHOLDER))) {
    throw new ConfigurationError(`Injector "${raw}" must reference the manifest file as ${FILE_PLACEHOLDER}`);
  }
  return argv;
}

/**
 * Parse `--inject` syntax: a command line such as
 * `istioctl kube-inject -f FILE`.
 */
export function parseInjectCommand(line: string): string[] {
  return requirePlaceholder(splitCommandLine(line), line);
}

/**
 * Parse the deprecated `--injector` syntax `CMD SUBCMD,FLAG1=VAL1,FLAG2=VAL2`.
 * Flags are given without their leading dashes.
 */
export function parseLegacyInjector(spec: string): string[] {
  const [command, ...flags] = spec.split(',');
  const argv = [
    ...splitCommandLine(command),
    ...flags.map((flag) => flag.trim()).filter(Boolean).map((flag) => `--${flag}`),
  ];
  return requirePlaceholder(argv, spec);
}

export interface InjectContext {
  runner: CommandRunner;
  /** Directory for the per-file inputs handed to the injector. */
  scratchDir: string;
  concurrency: number;
}

/** Group documents by source file, keeping first-appearance order. */
export function groupByFile(set: ManifestSet): Array<{ file: string; documents: ManifestDocument[] }> {
  const groups = new Map<string, ManifestDocument[]>();
  for (const doc of set) {
    const group = groups.get(doc.file);
    if (group) group.push(doc);
    else groups.set(doc.file, [doc]);
  }
  return [...groups].map(([file, documents]) => ({ file, documents }));
}

function scratchFileName(index: number, file: string): string {
  const stem = basename(file).replace(/[^a-zA-Z0-9._-]/g, '-');
  return `${String(index).padStart(3, '0')}-${/\.ya?ml$/.test(stem) ? stem : `${stem}.yaml`}`;
}

/**
 * Put injector output back into the original document order: a document
 * keeps the position of the input document with the same identity, new
 * documents go where their file first appeared.
 */
function restoreOrder(set: ManifestSet, outputs: Map<string, ManifestSet>): ManifestSet {
  const slots: ManifestSet[] = set.map(() => []);
  const positions = new Map<string, number>();
  const firstOfFile = new Map<string, number>();
  set.forEach((doc, index) => {
    positions.set(`${doc.file}\n${identityKey(doc.identity)}`, index);
    if (!firstOfFile.has(doc.file)) firstOfFile.set(doc.file, index);
  });

  for (const [file, output] of outputs) {
    for (const doc of output) {
      const index = positions.get(`${file}\n${identityKey(doc.identity)}`) ?? firstOfFile.get(file) ?? 0;
      slots[index].push(doc);
    }
  }
  return slots.flat();
}

/**
 * Run the injector once per manifest file. Files are independent, so calls
 * run concurrently; each file's documents are replaced by the injector's
 * output in place.
 */
export async function runInjector(
  set: ManifestSet,
  argv: string[],
  stage: string,
  ctx: InjectContext,
): Promise<ManifestSet> {
  const groups = groupByFile(set);
  await mkdir(ctx.scratchDir, { recursive: true });

  const replaced = await mapWithConcurrency(groups, ctx.concurrency, async (group, index) => {
    const inputPath = join(ctx.scratchDir, scratchFileName(index, group.file));
    await writeFile(inputPath, manifestsToMultiDoc(group.documents.map((d) => d.body)), 'utf-8');

    const [command, ...args] = argv;
    let stdout: string;
    try {
      ({ stdout } = await ctx.runner.run({
        command,
        args: args.map((arg) => arg.replaceAll(FILE_PLACEHOLDER, inputPath)),
      }));
    } catch (err) {
      throw new PipelineStageError(stage, causeMessage(err), group.file, { cause: err });
    }

    let output: ManifestSet;
    try {
      output = parseManifestStream(stdout, group.file);
    } catch (err) {
      throw new PipelineStageError(stage, `unparsable injector output: ${causeMessage(err)}`, group.file, {
        cause: err,
      });
    }
    if (output.length === 0) {
      throw new PipelineStageError(stage, 'injector produced no manifests', group.file);
    }
    // Keep the original file so later stages group documents the same way.
    return output.map((doc) => ({ ...doc, file: group.file }));
  });

  return restoreOrder(set, new Map(groups.map((group, index) => [group.file, replaced[index]])));
}
