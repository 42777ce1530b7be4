/**
 * Wiring Binder
 *
 * Computes the connection fact of every edge of a resolved graph: where the
 * consumer reaches its target, on which port, and under which credential
 * reference. Binding only reads the graph and the settings. Credential
 * references are names the artifact emitter resolves later, never secret values.
 */

import { getLogger, type Logger } from '@storefront/platform-core';
import { getBackendProfile, type BackendProfile } from '../backends/profiles.js';
import { InvariantError } from '../errors.js';
import type { ResolutionSettings } from '../settings/resolution-settings.js';
import type { ConnectionTemplate } from '../types.js';
import type { EdgeRelation, GraphEdge, GraphNode, ResolvedGraph, ServiceNode } from '../resolver/graph.js';
import { renderTemplate, type TemplateFields } from './template.js';

export interface ConnectionFact {
  readonly edgeId: string;
  /** Node id of the consumer */
  readonly consumer: string;
  /** Node id of what it connects to */
  readonly target: string;
  readonly relation: EdgeRelation;
  readonly endpoint: string;
  readonly credentialRef: string;
  readonly port: number;
}

export interface ServiceConfigBundle {
  readonly service: string;
  readonly port: number;
  /** Every fact whose consumer is this service, placement included */
  readonly facts: readonly ConnectionFact[];
  /** Runtime configuration derived from the dependency and upstream facts, keys sorted */
  readonly environment: Readonly<Record<string, string>>;
}

export interface Binding {
  readonly facts: readonly ConnectionFact[];
  readonly bundles: readonly ServiceConfigBundle[];
}

export interface WiringBinderOptions {
  logger?: Logger;
}

interface EdgeTemplate {
  connection: ConnectionTemplate;
  port: number;
}

export function toEnvKey(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
}

export class WiringBinder {
  private readonly logger: Logger;

  constructor(
    private readonly settings: ResolutionSettings,
    options: WiringBinderOptions = {}
  ) {
    this.logger = options.logger ?? getLogger('topology:binder');
  }

  bind(graph: ResolvedGraph): Binding {
    const profile = getBackendProfile(graph.target.backend);
    const nodes = new Map(graph.nodes.map(node => [node.id, node]));
    const position = new Map(graph.order.map((id, index) => [id, index]));
    const at = (id: string): number => position.get(id) ?? Number.MAX_SAFE_INTEGER;

    // Providers before their consumers
    const walk = [...graph.edges].sort(
      (a, b) => at(a.to) - at(b.to) || at(a.from) - at(b.from) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    );

    const facts: ConnectionFact[] = [];
    for (const edge of walk) {
      const consumer = nodes.get(edge.from);
      const target = nodes.get(edge.to);
      if (!consumer || !target) {
        throw new InvariantError(`edge ${edge.id} references a node outside the graph`, { edge: edge.id });
      }
      facts.push(this.bindEdge(graph, profile, edge, consumer, target));
    }

    const bound = new Set(facts.map(fact => fact.edgeId));
    if (bound.size !== graph.edges.length || facts.length !== graph.edges.length) {
      throw new InvariantError('every edge must carry exactly one connection fact', {
        edges: graph.edges.length,
        facts: facts.length,
      });
    }

    const bundles = graph.order
      .map(id => nodes.get(id))
      .filter((node): node is ServiceNode => node?.type === 'service')
      .map(node => this.bundle(node, facts, nodes));

    this.logger.debug('Connection facts bound', { facts: facts.length, services: bundles.length });
    return { facts, bundles };
  }

  private bindEdge(
    graph: ResolvedGraph,
    profile: BackendProfile,
    edge: GraphEdge,
    consumer: GraphNode,
    target: GraphNode
  ): ConnectionFact {
    const { connection, port } = this.templateFor(profile, edge, target);

    const base: TemplateFields = {
      backend: graph.target.backend,
      mode: graph.target.mode,
      environment: this.settings.environment,
      region: this.settings.region,
      namespace: this.settings.namespace,
      clusterDomain: profile.clusterDomain,
    };
    const fields: TemplateFields = {
      ...base,
      name: target.name,
      id: target.id,
      host: renderTemplate(profile.hostTemplate, { ...base, name: target.name }, edge.id),
      port: String(port),
      consumer: consumer.name,
      service: consumer.type === 'service' ? consumer.name : undefined,
      kind: edge.relation === 'dependency' ? edge.kind : undefined,
      provider: target.type === 'provider' ? target.provider.id : undefined,
    };

    return {
      edgeId: edge.id,
      consumer: consumer.id,
      target: target.id,
      relation: edge.relation,
      endpoint: renderTemplate(connection.endpoint, fields, edge.id),
      credentialRef: renderTemplate(connection.credentialRef, fields, edge.id),
      port,
    };
  }

  private templateFor(profile: BackendProfile, edge: GraphEdge, target: GraphNode): EdgeTemplate {
    const mismatch = (): never => {
      throw new InvariantError(`${edge.relation} edge ${edge.id} cannot target a ${target.type} node`, {
        edge: edge.id,
      });
    };

    switch (edge.relation) {
      case 'dependency':
        if (target.type !== 'provider') return mismatch();
        return { connection: target.provider.connection, port: target.provider.port };
      case 'upstream':
        if (target.type !== 'service') return mismatch();
        return { connection: profile.upstream, port: target.service.port };
      case 'route':
        if (target.type !== 'service' || !profile.ingress) return mismatch();
        return { connection: profile.ingress.connection, port: target.service.port };
      case 'placement':
        if (target.type !== 'infrastructure' || !profile.cluster) return mismatch();
        return { connection: profile.cluster.connection, port: target.port };
    }
  }

  private bundle(
    node: ServiceNode,
    facts: readonly ConnectionFact[],
    nodes: ReadonlyMap<string, GraphNode>
  ): ServiceConfigBundle {
    const own = facts.filter(fact => fact.consumer === node.id);
    const entries = new Map<string, { value: string; source: string }>();
    const put = (key: string, value: string, source: string): void => {
      const existing = entries.get(key);
      if (existing) {
        throw new InvariantError(`${source} and ${existing.source} both map to ${key} in the environment of ${node.name}`, {
          service: node.name,
          key,
          targets: [existing.source, source],
        });
      }
      entries.set(key, { value, source });
    };

    put('PORT', String(node.service.port), node.id);
    for (const fact of own) {
      const target = nodes.get(fact.target);
      let key: string;
      if (fact.relation === 'dependency' && target?.type === 'provider') {
        key = toEnvKey(target.kind);
      } else if (fact.relation === 'upstream' && target) {
        key = `${toEnvKey(target.name)}_SERVICE`;
        put(`${key}_URL`, `http://${fact.endpoint}:${fact.port}`, fact.target);
      } else {
        continue;
      }
      put(`${key}_ENDPOINT`, fact.endpoint, fact.target);
      put(`${key}_PORT`, String(fact.port), fact.target);
      put(`${key}_CREDENTIALS_REF`, fact.credentialRef, fact.target);
    }

    const environment = [...entries]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]): [string, string] => [key, entry.value]);
    return {
      service: node.name,
      port: node.service.port,
      facts: own,
      environment: Object.fromEntries(environment),
    };
  }
}
