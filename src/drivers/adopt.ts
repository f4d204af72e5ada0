import { AdoptionPartialFailureError, ConfigurationError, causeMessage } from '../errors.js';
import type { KubectlClient } from '../tools/kubectl.js';
import type { Logger } from '../utils/logger.js';

export const RELEASE_NAME_ANNOTATION = 'meta.helm.sh/release-name';
export const RELEASE_NAMESPACE_ANNOTATION = 'meta.helm.sh/release-namespace';
export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';

const RESOURCE_PATTERN = /^[A-Za-z][A-Za-z0-9.-]*\/[a-z0-9]([a-z0-9.:-]*[a-z0-9])?$/;

export interface AdoptRequest {
  release: string;
  /**
   * Namespace of the release and of the resources; the kube context's
   * namespace when absent, as helm resolves it.
   */
  namespace?: string;
  /** `kind/name` references, e.g. `configmap/foo.v1`. */
  resources: string[];
}

/** The merge patch that marks an object as owned by a Helm release. */
export function ownershipPatch(release: string, releaseNamespace: string): Record<string, unknown> {
  return {
    metadata: {
      labels: { [MANAGED_BY_LABEL]: 'Helm' },
      annotations: {
        [RELEASE_NAME_ANNOTATION]: release,
        [RELEASE_NAMESPACE_ANNOTATION]: releaseNamespace,
      },
    },
  };
}

export function validateResourceRefs(resources: string[]): void {
  const invalid = resources.filter((r) => !RESOURCE_PATTERN.test(r));
  if (invalid.length > 0) {
    throw new ConfigurationError(`Invalid resource reference(s) ${invalid.join(', ')}: expected KIND/NAME`);
  }
}

/**
 * Attach release ownership metadata to live objects, one at a time. The first
 * failure stops the run; objects adopted before it stay adopted.
 *
 * @returns the adopted resources, in request order
 */
export async function adoptResources(
  kubectl: KubectlClient,
  request: AdoptRequest,
  logger: Logger,
): Promise<string[]> {
  validateResourceRefs(request.resources);
  const releaseNamespace = request.namespace ?? (await kubectl.currentNamespace());
  const patch = ownershipPatch(request.release, releaseNamespace);
  const adopted: string[] = [];

  for (const [index, resource] of request.resources.entries()) {
    try {
      await kubectl.mergePatch(resource, patch, request.namespace);
    } catch (err) {
      throw new AdoptionPartialFailureError(
        adopted,
        { resource, reason: causeMessage(err) },
        request.resources.slice(index + 1),
      );
    }
    adopted.push(resource);
    logger.debug(`Adopted ${resource} into release ${request.release}`);
  }

  return adopted;
}
