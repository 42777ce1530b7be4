/**
 * Topology Resolver
 *
 * Turns the catalog into the graph of everything a deployment target needs:
 * one node per service, one per selected provider instance, and the target's
 * shared infrastructure. Catalog, registry and settings are injected, so
 * independent resolutions share no mutable state.
 */

import { getLogger, type Logger } from '@storefront/platform-core';
import { getBackendProfile, parseTarget, SERVICE_WEIGHT, type SharedInfrastructure } from '../backends/profiles.js';
import { CatalogError, InvariantError } from '../errors.js';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import type { ResolutionSettings } from '../settings/resolution-settings.js';
import type { Catalog, DependencyRequirement, DeploymentTarget, ProviderDefinition, ServiceSpec } from '../types.js';
import {
  SHARED_SCOPE,
  byId,
  edgeId,
  infrastructureNodeId,
  providerNodeId,
  serviceNodeId,
  type GraphEdge,
  type GraphNode,
  type InfrastructureNode,
  type InfrastructureRole,
  type LinkEdge,
  type ProviderNode,
  type ResolvedGraph,
} from './graph.js';
import { orderTopologically } from './ordering.js';

export interface TopologyResolverOptions {
  logger?: Logger;
}

// Nodes hold copies: freezing a resolved graph must not freeze the caller's catalog or registry
function copyService(service: ServiceSpec): ServiceSpec {
  return {
    ...service,
    requires: service.requires.map(requirement => ({ ...requirement })),
    optional: service.optional.map(requirement => ({ ...requirement })),
    upstreams: [...service.upstreams],
    resources: { ...service.resources },
  };
}

function copyProvider(provider: ProviderDefinition): ProviderDefinition {
  return { ...provider, backends: [...provider.backends], connection: { ...provider.connection } };
}

/**
 * Accumulates the nodes and edges of one resolution run
 */
class GraphBuild {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private readonly names = new Map<string, string>();

  constructor(private readonly target: DeploymentTarget) {}

  get(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  addNode<T extends GraphNode>(node: T): T {
    if (this.nodes.has(node.id)) {
      throw new InvariantError(`node ${node.id} added twice`, { node: node.id });
    }
    // Names become host names, so they must be unique across node types.
    // Only a service name can clash with a provider or infrastructure name.
    const owner = this.names.get(node.name);
    if (owner) {
      const { backend, mode } = this.target;
      throw new CatalogError(`'${node.name}' would name both ${owner} and ${node.id} on ${backend}/${mode}`, {
        name: node.name,
        nodes: [owner, node.id],
        backend,
        mode,
      });
    }
    this.nodes.set(node.id, node);
    this.names.set(node.name, node.id);
    return node;
  }

  addEdge(edge: GraphEdge): void {
    if (this.edges.has(edge.id)) {
      throw new InvariantError(`edge ${edge.id} added twice`, { edge: edge.id });
    }
    this.edges.set(edge.id, edge);
  }

  link(from: string, to: string, relation: LinkEdge['relation']): void {
    this.addEdge({ id: edgeId(from, to), from, to, relation });
  }

  sortedNodes(): GraphNode[] {
    return [...this.nodes.values()].sort(byId);
  }

  sortedEdges(): GraphEdge[] {
    return [...this.edges.values()].sort(byId);
  }
}

export class TopologyResolver {
  private readonly logger: Logger;

  constructor(
    private readonly catalog: Catalog,
    private readonly registry: ProviderRegistry,
    private readonly settings: ResolutionSettings,
    options: TopologyResolverOptions = {}
  ) {
    this.logger = options.logger ?? getLogger('topology:resolver');
  }

  resolveGraph(requested: DeploymentTarget): ResolvedGraph {
    const target = parseTarget(requested.backend, requested.mode);
    const profile = getBackendProfile(target.backend);
    const build = new GraphBuild(target);

    for (const service of this.catalog) {
      build.addNode({
        type: 'service',
        id: serviceNodeId(service.name),
        name: service.name,
        weight: SERVICE_WEIGHT,
        service: copyService(service),
      });
    }

    const cluster = profile.cluster ? build.addNode(this.infrastructureNode('cluster', profile.cluster)) : undefined;
    if (cluster) {
      for (const service of this.catalog) {
        build.link(serviceNodeId(service.name), cluster.id, 'placement');
      }
    }

    const external = this.catalog.filter(service => service.exposure === 'external');
    if (profile.ingress && external.length > 0) {
      const ingress = build.addNode(this.infrastructureNode('ingress', profile.ingress, { routes: external.length }));
      for (const service of external) {
        build.link(ingress.id, serviceNodeId(service.name), 'route');
      }
    }

    for (const service of this.catalog) {
      for (const requirement of service.requires) {
        this.addDependency(build, target, service, requirement, false, cluster);
      }
      for (const requirement of service.optional) {
        if (this.registry.providersFor(requirement.kind, target.backend, target.mode).length === 0) {
          this.logger.debug('Optional dependency skipped, no provider on target', {
            service: service.name,
            kind: requirement.kind,
            backend: target.backend,
            mode: target.mode,
          });
          continue;
        }
        this.addDependency(build, target, service, requirement, true, cluster);
      }
    }

    for (const service of this.catalog) {
      for (const upstream of service.upstreams) {
        build.link(serviceNodeId(service.name), serviceNodeId(upstream), 'upstream');
      }
    }

    const nodes = build.sortedNodes();
    const edges = build.sortedEdges();
    this.assertNoOrphans(nodes, edges);

    const order = orderTopologically(nodes, edges);

    this.logger.info('Topology resolved', {
      backend: target.backend,
      mode: target.mode,
      services: this.catalog.length,
      providers: nodes.filter(n => n.type === 'provider').length,
      edges: edges.length,
    });

    return { target, nodes, edges, order };
  }

  private addDependency(
    build: GraphBuild,
    target: DeploymentTarget,
    service: ServiceSpec,
    requirement: DependencyRequirement,
    optional: boolean,
    cluster: InfrastructureNode | undefined
  ): void {
    const provider = this.registry.selectProvider(requirement.kind, target.backend, target.mode, service.name);
    const scope = requirement.dedicated ? service.name : SHARED_SCOPE;
    const name = requirement.dedicated ? `${service.name}-${provider.id}` : provider.id;
    const id = providerNodeId(name);

    let node = build.get(id);
    if (!node) {
      const created: ProviderNode = {
        type: 'provider',
        id,
        name,
        weight: provider.weight,
        kind: requirement.kind,
        scope,
        provider: copyProvider(provider),
      };
      node = build.addNode(created);
      if (provider.placement === 'in-cluster') {
        if (!cluster) {
          throw new InvariantError(`in-cluster provider ${provider.id} selected on ${target.backend}, which has no cluster`, {
            provider: provider.id,
            backend: target.backend,
          });
        }
        build.link(id, cluster.id, 'placement');
      }
    }

    const from = serviceNodeId(service.name);
    build.addEdge({
      id: edgeId(from, node.id),
      from,
      to: node.id,
      relation: 'dependency',
      kind: requirement.kind,
      access: requirement.access,
      optional,
    });
  }

  private infrastructureNode(
    role: InfrastructureRole,
    infrastructure: SharedInfrastructure,
    extra: Record<string, string | number> = {}
  ): InfrastructureNode {
    const attributes: Record<string, string | number> =
      role === 'cluster'
        ? {
            ...this.settings.cluster,
            vpcNetworkCidr: this.settings.vpcNetworkCidr,
          }
        : {};

    return {
      type: 'infrastructure',
      id: infrastructureNodeId(role),
      name: infrastructure.name,
      weight: infrastructure.weight,
      role,
      engine: infrastructure.engine,
      port: infrastructure.port,
      attributes: { ...attributes, ...extra },
    };
  }

  private assertNoOrphans(nodes: readonly GraphNode[], edges: readonly GraphEdge[]): void {
    const consumed = new Set(edges.map(edge => edge.to));
    const orphans = nodes.filter(node => node.type === 'provider' && !consumed.has(node.id)).map(node => node.id);
    if (orphans.length > 0) {
      throw new InvariantError(`provider nodes without a consumer: ${orphans.join(', ')}`, { orphans });
    }
  }
}
