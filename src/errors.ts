import { ZodError } from 'zod';
import type { ManifestIdentity } from './types/manifest.js';
import type { SourceVariant } from './types/source.js';

export type ErrorCode =
  | 'SOURCE_RESOLUTION'
  | 'PIPELINE_STAGE'
  | 'DUPLICATE_MANIFEST'
  | 'DEPENDENCY_CONFLICT'
  | 'MATERIALIZATION'
  | 'COLLABORATOR_EXECUTION'
  | 'RELEASE_NOT_FOUND'
  | 'ADOPTION_PARTIAL_FAILURE'
  | 'CONFIGURATION';

/**
 * Base class for every operational failure. The CLI reports these without
 * printing usage text.
 */
export abstract class ChartifyError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceResolutionError extends ChartifyError {
  readonly code = 'SOURCE_RESOLUTION';

  constructor(
    readonly input: string,
    readonly variant: SourceVariant | 'unknown',
    readonly missing: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot resolve "${input}" as ${variant}: ${missing}`, options);
  }
}

export class PipelineStageError extends ChartifyError {
  readonly code = 'PIPELINE_STAGE';

  constructor(
    readonly stage: string,
    readonly detail: string,
    readonly document?: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Pipeline stage ${stage} failed${document ? ` on ${document}` : ''}: ${detail}`,
      options,
    );
  }
}

export class DuplicateManifestError extends ChartifyError {
  readonly code = 'DUPLICATE_MANIFEST';

  constructor(readonly identity: ManifestIdentity, readonly files: string[]) {
    super(
      `Duplicate manifest ${identity.kind}/${identity.name}` +
        `${identity.namespace ? ` in namespace ${identity.namespace}` : ''} ` +
        `(${identity.apiVersion}) found in ${files.join(', ')}`,
    );
  }
}

export class DependencyConflictError extends ChartifyError {
  readonly code = 'DEPENDENCY_CONFLICT';

  constructor(readonly alias: string) {
    super(`Dependency alias "${alias}" is declared more than once`);
  }
}

export class MaterializationError extends ChartifyError {
  readonly code = 'MATERIALIZATION';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write chart file ${path}: ${causeMessage(options?.cause)}`, options);
  }
}

export class CollaboratorExecutionError extends ChartifyError {
  readonly code = 'COLLABORATOR_EXECUTION';

  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    const status = exitCode === null ? 'could not be run' : `exited with code ${exitCode}`;
    const tail = stderr.trim() ? `\n${stderr.trim()}` : '';
    super(`Command "${command}" ${status}${tail}`, options);
  }
}

export class ReleaseNotFoundError extends ChartifyError {
  readonly code = 'RELEASE_NOT_FOUND';

  constructor(readonly namespace: string | undefined, readonly release: string, readonly revision?: number) {
    const rev = revision === undefined ? '' : ` revision ${revision}`;
    super(`Release "${release}"${rev} not found${namespace ? ` in namespace ${namespace}` : ''}`);
  }
}

export interface AdoptionFailure {
  resource: string;
  reason: string;
}

export class AdoptionPartialFailureError extends ChartifyError {
  readonly code = 'ADOPTION_PARTIAL_FAILURE';

  constructor(
    readonly adopted: string[],
    readonly failed: AdoptionFailure,
    readonly pending: string[],
  ) {
    const lines = [
      `Failed to adopt ${failed.resource}: ${failed.reason}`,
      `  adopted: ${adopted.length > 0 ? adopted.join(', ') : '(none)'}`,
      `  not adopted: ${[failed.resource, ...pending].join(', ')}`,
    ];
    super(lines.join('\n'));
  }
}

export class ConfigurationError extends ChartifyError {
  readonly code = 'CONFIGURATION';
}

export function causeMessage(cause: unknown): string {
  if (cause instanceof ZodError) {
    return cause.errors
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
  }
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
