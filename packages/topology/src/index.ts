/**
 * Storefront Topology
 *
 * Resolves the storefront services into a provisioning graph with bound
 * connection facts for one backend/mode target.
 */

export * from './types.js';
export * from './errors.js';
export * from './catalog/index.js';
export * from './registry/index.js';
export * from './backends/index.js';
export * from './settings/index.js';
export * from './resolver/graph.js';
export { orderTopologically, detectCycles } from './resolver/ordering.js';
export { TopologyResolver, type TopologyResolverOptions } from './resolver/topology-resolver.js';
export {
  WiringBinder,
  toEnvKey,
  type Binding,
  type ConnectionFact,
  type ServiceConfigBundle,
  type WiringBinderOptions,
} from './binder/wiring-binder.js';
export { renderTemplate, TEMPLATE_FIELDS, type TemplateField } from './binder/template.js';
export { resolve, type ResolveOptions, type ResolvedTopology } from './resolve.js';
export { runResolveCommand, type CommandOutput } from './cli.js';
