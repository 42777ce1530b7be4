/**
 * Topology Types
 *
 * Shared vocabulary of the catalog, registry, resolver and binder.
 */

export const DEPENDENCY_KINDS = ['relational-store', 'document-store', 'cache', 'queue'] as const;
export type DependencyKind = (typeof DEPENDENCY_KINDS)[number];

export const BACKENDS = ['eks-default', 'eks-minimal', 'ecs-default', 'apprunner'] as const;
export type Backend = (typeof BACKENDS)[number];

export const MODES = ['managed-dependencies', 'in-cluster-dependencies'] as const;
export type Mode = (typeof MODES)[number];

export interface DeploymentTarget {
  readonly backend: Backend;
  readonly mode: Mode;
}

export type AccessMode = 'read' | 'write';
export type Exposure = 'internal' | 'external';

export interface DependencyRequirement {
  readonly kind: DependencyKind;
  readonly access: AccessMode;
  /** Request a provider instance of its own instead of the shared one */
  readonly dedicated: boolean;
}

export interface ResourceHints {
  readonly cpu: string;
  readonly memory: string;
}

export interface ServiceSpec {
  readonly name: string;
  readonly port: number;
  readonly requires: readonly DependencyRequirement[];
  readonly optional: readonly DependencyRequirement[];
  /** Other catalog services this one calls at runtime */
  readonly upstreams: readonly string[];
  readonly exposure: Exposure;
  readonly resources: ResourceHints;
}

export type Catalog = readonly ServiceSpec[];

/**
 * How an edge's connection fact is computed. Strings may reference `{{field}}`
 * placeholders; see TEMPLATE_FIELDS in the binder.
 */
export interface ConnectionTemplate {
  readonly endpoint: string;
  readonly credentialRef: string;
}

export type Placement = 'managed' | 'in-cluster';

export interface ProviderDefinition {
  readonly id: string;
  readonly kind: DependencyKind;
  readonly backends: readonly Backend[];
  /** `any` marks a fallback used only when no provider matches the mode exactly */
  readonly mode: Mode | 'any';
  readonly priority?: number;
  /** Provisioning order, lower first */
  readonly weight: number;
  readonly port: number;
  readonly placement: Placement;
  readonly connection: ConnectionTemplate;
}

export function isDependencyKind(value: string): value is DependencyKind {
  return DEPENDENCY_KINDS.some(kind => kind === value);
}

export function isBackend(value: string): value is Backend {
  return BACKENDS.some(backend => backend === value);
}

export function isMode(value: string): value is Mode {
  return MODES.some(mode => mode === value);
}
