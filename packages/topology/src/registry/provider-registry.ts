/**
 * Dependency Provider Registry
 *
 * Answers which provider implements a dependency kind on a given backend/mode.
 * Selection never depends on registration order: when more than one provider
 * qualifies and no explicit priority separates them, that is a registry error.
 */

import { getLogger } from '@storefront/platform-core';
import { AmbiguousProviderError, NoProviderError, RegistryError } from '../errors.js';
import { getBackendProfile } from '../backends/profiles.js';
import type { Backend, DependencyKind, Mode, ProviderDefinition } from '../types.js';

const logger = getLogger('topology:registry');

const PROVIDER_ID = /^[a-z][a-z0-9-]*$/;

function rank(provider: ProviderDefinition): number {
  return provider.priority ?? Number.NEGATIVE_INFINITY;
}

function validateDefinition(provider: ProviderDefinition): void {
  const fail = (message: string): never => {
    throw new RegistryError(`provider '${provider.id}' ${message}`, { provider: provider.id });
  };

  if (!PROVIDER_ID.test(provider.id)) fail('has an invalid id (expected lowercase kebab-case)');
  if (provider.backends.length === 0) fail('supports no backend');
  if (!Number.isFinite(provider.weight)) fail('has a non-finite provisioning weight');
  if (provider.priority !== undefined && !Number.isFinite(provider.priority)) fail('has a non-finite priority');
  if (!Number.isInteger(provider.port) || provider.port < 1 || provider.port > 65535) fail('has an invalid port');
  if (!provider.connection.endpoint || !provider.connection.credentialRef) fail('has an empty connection template');
  if (provider.placement === 'in-cluster') {
    if (provider.mode === 'managed-dependencies') fail('runs in-cluster but is registered for managed-dependencies');
    const clusterless = provider.backends.filter(backend => !getBackendProfile(backend).cluster);
    if (clusterless.length > 0) fail(`runs in-cluster but lists backends without a cluster: ${clusterless.join(', ')}`);
  }
}

export class ProviderRegistry {
  private readonly providers: readonly ProviderDefinition[];

  constructor(definitions: readonly ProviderDefinition[]) {
    const ids = new Set<string>();
    for (const definition of definitions) {
      validateDefinition(definition);
      if (ids.has(definition.id)) {
        throw new RegistryError(`duplicate provider id '${definition.id}'`, { provider: definition.id });
      }
      ids.add(definition.id);
    }
    this.providers = Object.freeze([...definitions].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)));
  }

  list(): readonly ProviderDefinition[] {
    return this.providers;
  }

  get(id: string): ProviderDefinition | undefined {
    return this.providers.find(p => p.id === id);
  }

  /**
   * Providers eligible for a kind on a backend/mode, exact-mode and fallback alike. Empty if none.
   */
  providersFor(kind: DependencyKind, backend: Backend, mode: Mode): ProviderDefinition[] {
    return this.providers.filter(
      p => p.kind === kind && p.backends.includes(backend) && (p.mode === mode || p.mode === 'any')
    );
  }

  /**
   * Pick the single provider for a kind. `service` only enriches the error.
   */
  selectProvider(kind: DependencyKind, backend: Backend, mode: Mode, service?: string): ProviderDefinition {
    const candidates = this.providersFor(kind, backend, mode);
    if (candidates.length === 0) {
      throw new NoProviderError(kind, backend, mode, service);
    }

    const exact = candidates.filter(p => p.mode === mode);
    const tier = exact.length > 0 ? exact : candidates;

    const top = Math.max(...tier.map(rank));
    const winners = tier.filter(p => rank(p) === top);
    if (winners.length > 1) {
      throw new AmbiguousProviderError(
        kind,
        backend,
        mode,
        winners.map(p => p.id)
      );
    }

    const [selected] = winners;
    logger.debug('Provider selected', {
      kind,
      backend,
      mode,
      provider: selected.id,
      fallback: exact.length === 0,
      candidates: candidates.length,
    });
    return selected;
  }
}
