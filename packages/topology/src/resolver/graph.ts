/**
 * Resolved Graph
 *
 * Nodes are workloads (services), selected providers and the backend's shared
 * infrastructure. An edge always points from a consumer to what it needs, so
 * the edge target must exist before its source.
 */

import type {
  AccessMode,
  DependencyKind,
  DeploymentTarget,
  ProviderDefinition,
  ServiceSpec,
} from '../types.js';

export type NodeType = 'service' | 'provider' | 'infrastructure';

interface BaseNode {
  readonly id: string;
  readonly name: string;
  readonly weight: number;
}

export interface ServiceNode extends BaseNode {
  readonly type: 'service';
  readonly service: ServiceSpec;
}

export interface ProviderNode extends BaseNode {
  readonly type: 'provider';
  readonly kind: DependencyKind;
  /** `shared`, or the name of the service that asked for a dedicated instance */
  readonly scope: string;
  readonly provider: ProviderDefinition;
}

export type InfrastructureRole = 'cluster' | 'ingress';

export interface InfrastructureNode extends BaseNode {
  readonly type: 'infrastructure';
  readonly role: InfrastructureRole;
  readonly engine: string;
  readonly port: number;
  readonly attributes: Readonly<Record<string, string | number>>;
}

export type GraphNode = ServiceNode | ProviderNode | InfrastructureNode;

export interface DependencyEdge {
  readonly id: string;
  readonly from: string;
  readonly to: string;
  readonly relation: 'dependency';
  readonly kind: DependencyKind;
  readonly access: AccessMode;
  readonly optional: boolean;
}

export interface LinkEdge {
  readonly id: string;
  readonly from: string;
  readonly to: string;
  /** upstream: service call; placement: runs on the cluster; route: ingress forwards to a service */
  readonly relation: 'upstream' | 'placement' | 'route';
}

export type GraphEdge = DependencyEdge | LinkEdge;
export type EdgeRelation = GraphEdge['relation'];

export interface ResolvedGraph {
  readonly target: DeploymentTarget;
  /** Sorted by id */
  readonly nodes: readonly GraphNode[];
  /** Sorted by id */
  readonly edges: readonly GraphEdge[];
  /** Node ids, every edge target before its source */
  readonly order: readonly string[];
}

export const SHARED_SCOPE = 'shared';

export function serviceNodeId(name: string): string {
  return `service:${name}`;
}

export function providerNodeId(name: string): string {
  return `provider:${name}`;
}

export function infrastructureNodeId(role: InfrastructureRole): string {
  return `infrastructure:${role}`;
}

export function edgeId(from: string, to: string): string {
  return `${from}->${to}`;
}

export function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
