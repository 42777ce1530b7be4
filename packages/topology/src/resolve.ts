/**
 * Resolution entry point
 *
 * resolve() is the whole contract offered to the artifact emitters: a pure
 * function of catalog, registry and target that either returns a fully bound
 * topology or throws a TopologyError. Nothing partial is ever returned.
 */

import { generateCorrelationId, getLogger, runWithContext, serializeError, type Logger } from '@storefront/platform-core';
import { parseTarget } from './backends/profiles.js';
import { WiringBinder, type ConnectionFact, type ServiceConfigBundle } from './binder/wiring-binder.js';
import { deepFreeze } from './freeze.js';
import type { ProviderRegistry } from './registry/provider-registry.js';
import type { ResolvedGraph } from './resolver/graph.js';
import { TopologyResolver } from './resolver/topology-resolver.js';
import {
  loadResolutionSettings,
  type ResolutionSettings,
  type SettingsOverrides,
} from './settings/resolution-settings.js';
import type { Backend, Catalog, DeploymentTarget, Mode } from './types.js';

export interface ResolveOptions {
  /** Explicit settings, taking precedence over the environment */
  settings?: SettingsOverrides;
  /** Environment the settings are read from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface ResolvedTopology {
  readonly target: DeploymentTarget;
  readonly settings: ResolutionSettings;
  readonly graph: ResolvedGraph;
  /** Node ids in provisioning order */
  readonly order: readonly string[];
  readonly facts: readonly ConnectionFact[];
  readonly bundles: readonly ServiceConfigBundle[];
}

export function resolve(
  catalog: Catalog,
  registry: ProviderRegistry,
  backend: Backend,
  mode: Mode,
  options: ResolveOptions = {}
): ResolvedTopology {
  const logger = options.logger ?? getLogger('topology');

  return runWithContext({ correlationId: generateCorrelationId(), backend, mode }, () => {
    try {
      const target = parseTarget(backend, mode);
      const settings = loadResolutionSettings(target.backend, options.env ?? process.env, options.settings);

      const graph = new TopologyResolver(catalog, registry, settings, { logger }).resolveGraph(target);
      const { facts, bundles } = new WiringBinder(settings, { logger }).bind(graph);

      return deepFreeze({ target, settings, graph, order: graph.order, facts, bundles });
    } catch (error) {
      logger.error('Topology resolution failed', { backend, mode, error: serializeError(error, false) });
      throw error;
    }
  });
}
