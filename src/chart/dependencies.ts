import { ConfigurationError, DependencyConflictError } from '../errors.js';
import type { ChartDependency, ChartMetadata, DependencySpec } from '../types/chart.js';

/** Version constraint used when a dependency names none. */
export const ANY_VERSION = '*';

/**
 * Bare repository names refer to repositories added with `helm repo add`,
 * which Chart.yaml spells `@name`. URLs are kept as they are.
 */
export function normalizeRepository(repository: string): string {
  if (/^[a-z][a-z0-9+.-]*:\/\//.test(repository) || repository.startsWith('@')) {
    return repository;
  }
  return `@${repository}`;
}

/**
 * Parse `ALIAS=REPO/CHART:VERSION`, e.g. `mydb=stable/mysql:1.2.3`. The alias
 * defaults to the chart name and the version to any version.
 */
export function parseDependencySpec(text: string): DependencySpec {
  const eq = text.indexOf('=');
  const alias = eq === -1 ? '' : text.slice(0, eq).trim();
  let reference = (eq === -1 ? text : text.slice(eq + 1)).trim();

  const slash = reference.lastIndexOf('/');
  if (slash <= 0) {
    throw new ConfigurationError(`Invalid dependency "${text}": expected ALIAS=REPO/CHART:VERSION`);
  }

  let version = ANY_VERSION;
  const colon = reference.lastIndexOf(':');
  if (colon > slash) {
    version = reference.slice(colon + 1);
    reference = reference.slice(0, colon);
  }

  const repository = reference.slice(0, slash);
  const chart = reference.slice(slash + 1);
  if (!chart || !version) {
    throw new ConfigurationError(`Invalid dependency "${text}": expected ALIAS=REPO/CHART:VERSION`);
  }
  if (alias && !/^[A-Za-z0-9_-]+$/.test(alias)) {
    throw new ConfigurationError(`Invalid dependency alias "${alias}"`);
  }

  return {
    alias: alias || chart,
    repository: normalizeRepository(repository),
    chart,
    version,
  };
}

function dependencyKey(dep: ChartDependency): string {
  return dep.alias ?? dep.name;
}

/**
 * Append ad-hoc dependencies to a chart's metadata. An alias may appear
 * once across the chart's own dependencies and the added ones. Charts are
 * not fetched here; helm resolves them when it installs or renders.
 */
export function mergeDependencies(
  metadata: ChartMetadata,
  specs: readonly DependencySpec[],
): ChartMetadata {
  if (specs.length === 0) return metadata;

  const existing = metadata.dependencies ?? [];
  const seen = new Set(existing.map(dependencyKey));
  const added: ChartDependency[] = [];

  for (const spec of specs) {
    if (seen.has(spec.alias)) {
      throw new DependencyConflictError(spec.alias);
    }
    seen.add(spec.alias);
    added.push({
      name: spec.chart,
      version: spec.version,
      repository: spec.repository,
      alias: spec.alias,
    });
  }

  return {
    ...metadata,
    // Chart.yaml dependencies need apiVersion v2
    apiVersion: metadata.apiVersion === 'v1' ? 'v2' : metadata.apiVersion,
    dependencies: [...existing, ...added],
  };
}
