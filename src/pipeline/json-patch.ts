import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { applyPatch, type Operation } from 'rfc6902';
import { PipelineStageError } from '../errors.js';
import type { K8sManifest } from '../types/k8s.js';
import type { ManifestDocument, ManifestSet } from '../types/manifest.js';
import type { TargetSelector } from '../types/pipeline.js';
import { describeIdentity, identityOf } from '../utils/k8s-names.js';
import { isRecord, toManifest } from '../utils/yaml.js';
import { describeTarget, matchesTarget } from './selector.js';

const operationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('add'), path: z.string(), value: z.unknown() }),
  z.object({ op: z.literal('replace'), path: z.string(), value: z.unknown() }),
  z.object({ op: z.literal('test'), path: z.string(), value: z.unknown() }),
  z.object({ op: z.literal('remove'), path: z.string() }),
  z.object({ op: z.literal('move'), from: z.string(), path: z.string() }),
  z.object({ op: z.literal('copy'), from: z.string(), path: z.string() }),
]);

export const targetSelectorSchema = z
  .object({
    group: z.string().optional(),
    version: z.string().optional(),
    kind: z.string().optional(),
    name: z.string().optional(),
    namespace: z.string().optional(),
  })
  .strict();

const entrySchema = z.object({
  target: targetSelectorSchema,
  patch: z.array(operationSchema),
});

type PatchOperation = z.infer<typeof operationSchema>;

export interface JsonPatchEntry {
  target: TargetSelector;
  operations: Operation[];
}

function toOperation(op: PatchOperation): Operation {
  switch (op.op) {
    case 'add':
    case 'replace':
    case 'test':
      return { op: op.op, path: op.path, value: op.value };
    case 'remove':
      return { op: op.op, path: op.path };
    case 'move':
    case 'copy':
      return { op: op.op, from: op.from, path: op.path };
  }
}

/**
 * Parse a JSON patch file. It holds either a list of `{target, patch}`
 * entries, or a bare operation array that applies to `target`.
 */
export function parseJsonPatch(content: string, target?: TargetSelector): JsonPatchEntry[] {
  const parsed: unknown = parseYaml(content) ?? [];
  const items = Array.isArray(parsed) ? parsed : [parsed];

  const isBareOperationList = items.length > 0 && items.every((item) => isRecord(item) && 'op' in item);
  if (isBareOperationList) {
    if (!target) {
      throw new Error('a bare operation list needs a target selector');
    }
    const operations = z.array(operationSchema).parse(items).map(toOperation);
    return [{ target, operations }];
  }

  return z
    .array(entrySchema)
    .parse(items)
    .map((entry) => ({ target: entry.target, operations: entry.patch.map(toOperation) }));
}

export async function loadJsonPatch(file: string, target?: TargetSelector): Promise<JsonPatchEntry[]> {
  return parseJsonPatch(await readFile(file, 'utf-8'), target);
}

export interface PatchOutcome {
  manifests: ManifestSet;
  /** Targets that matched no document. */
  unmatched: string[];
}

function patchDocument(doc: ManifestDocument, operations: Operation[], stage: string): ManifestDocument {
  const body = structuredClone(doc.body);
  const results = applyPatch(body, operations);
  const failure = results.find((result) => result !== null);
  if (failure) {
    throw new PipelineStageError(stage, failure.message, describeIdentity(doc.identity));
  }

  let patched: K8sManifest;
  try {
    patched = toManifest(body, doc.file);
  } catch (err) {
    throw new PipelineStageError(stage, 'patch removed identity fields', describeIdentity(doc.identity), {
      cause: err,
    });
  }
  return { identity: identityOf(patched), body: patched, file: doc.file };
}

/**
 * Apply every entry in order; each entry sees the output of the previous.
 */
export function applyJsonPatch(set: ManifestSet, entries: JsonPatchEntry[], stage: string): PatchOutcome {
  let manifests = set;
  const unmatched: string[] = [];

  for (const entry of entries) {
    let matched = 0;
    manifests = manifests.map((doc) => {
      if (!matchesTarget(doc, entry.target)) return doc;
      matched++;
      return patchDocument(doc, entry.operations, stage);
    });
    if (matched === 0) unmatched.push(describeTarget(entry.target));
  }

  return { manifests, unmatched };
}
