import { z } from 'zod';
import { targetSelectorSchema } from '../pipeline/json-patch.js';

const stageSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('inject'),
      /** A command line, or its words. Must reference FILE. */
      command: z.union([z.string().min(1), z.array(z.string()).min(1)]),
    })
    .strict(),
  z
    .object({
      type: z.literal('json-patch'),
      file: z.string().min(1),
      target: targetSelectorSchema.optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('strategic-merge-patch'),
      file: z.string().min(1),
    })
    .strict(),
]);

const dependencySchema = z.union([
  z.string().min(1),
  z
    .object({
      alias: z.string().optional(),
      repository: z.string().min(1),
      chart: z.string().min(1),
      version: z.string().optional(),
    })
    .strict(),
]);

const toolsSchema = z
  .object({
    helm: z.string().min(1).optional(),
    kubectl: z.string().min(1).optional(),
    kustomize: z.string().min(1).optional(),
  })
  .strict();

export const storageDriverSchema = z.enum(['secret', 'configmap']);

export const configFileSchema = z
  .object({
    namespace: z.string().min(1).optional(),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    repo: z.string().min(1).optional(),
    kubeContext: z.string().min(1).optional(),
    strictPatches: z.boolean().optional(),
    values: z.array(z.string()).default([]),
    set: z.array(z.string()).default([]),
    pipeline: z.array(stageSchema).default([]),
    dependencies: z.array(dependencySchema).default([]),
    tools: toolsSchema.default({}),
    storage: z.object({ driver: storageDriverSchema.optional() }).strict().default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type ConfigStage = z.infer<typeof stageSchema>;
export type ConfigDependency = z.infer<typeof dependencySchema>;
