/**
 * Backend Profiles
 *
 * What each deployment backend contributes beyond the providers: the shared
 * infrastructure every workload lands on, the modes it accepts, and how a
 * workload's host name is derived from its node name.
 */

import { UnsupportedTargetError } from '../errors.js';
import { BACKENDS, MODES, isBackend, isMode, type Backend, type ConnectionTemplate, type DeploymentTarget, type Mode } from '../types.js';

export interface ClusterDefaults {
  readonly minClusterSize: number;
  readonly maxClusterSize: number;
  readonly desiredClusterSize: number;
  readonly nodeInstanceType: string;
}

export interface SharedInfrastructure {
  readonly name: string;
  readonly engine: string;
  readonly weight: number;
  readonly port: number;
  readonly connection: ConnectionTemplate;
}

export interface BackendProfile {
  readonly backend: Backend;
  readonly modes: readonly Mode[];
  /** Template for the host of any workload on this backend, rendered with the workload's fields */
  readonly hostTemplate: string;
  readonly clusterDomain?: string;
  readonly clusterDefaults: ClusterDefaults;
  readonly cluster?: SharedInfrastructure;
  readonly ingress?: SharedInfrastructure;
  /** Connection template for service-to-service calls */
  readonly upstream: ConnectionTemplate;
}

export const SERVICE_WEIGHT = 100;

const INTERNAL_SERVICE_TOKEN = '{{environment}}/internal-service-token';

const EKS_CLUSTER: SharedInfrastructure = {
  name: 'cluster',
  engine: 'eks',
  weight: 0,
  port: 443,
  connection: {
    endpoint: '{{environment}}-{{name}}.eks.{{region}}.amazonaws.com',
    credentialRef: '{{environment}}-{{name}}-kubeconfig',
  },
};

const EKS_INGRESS: SharedInfrastructure = {
  name: 'ingress',
  engine: 'aws-load-balancer-controller',
  weight: 200,
  port: 443,
  connection: {
    endpoint: '{{host}}',
    credentialRef: '{{environment}}-{{consumer}}-tls',
  },
};

const KUBERNETES_PROFILE = {
  modes: MODES,
  hostTemplate: '{{name}}.{{namespace}}.svc.{{clusterDomain}}',
  clusterDomain: 'cluster.local',
  cluster: EKS_CLUSTER,
  ingress: EKS_INGRESS,
  upstream: { endpoint: '{{host}}', credentialRef: INTERNAL_SERVICE_TOKEN },
} as const;

const PROFILES: Readonly<Record<Backend, BackendProfile>> = {
  'eks-default': {
    ...KUBERNETES_PROFILE,
    backend: 'eks-default',
    clusterDefaults: { minClusterSize: 1, maxClusterSize: 2, desiredClusterSize: 2, nodeInstanceType: 't3.medium' },
  },
  'eks-minimal': {
    ...KUBERNETES_PROFILE,
    backend: 'eks-minimal',
    clusterDefaults: { minClusterSize: 1, maxClusterSize: 1, desiredClusterSize: 1, nodeInstanceType: 't3.small' },
  },
  'ecs-default': {
    backend: 'ecs-default',
    modes: ['managed-dependencies'],
    // Service Connect namespace
    hostTemplate: '{{name}}.{{namespace}}.local',
    clusterDefaults: { minClusterSize: 1, maxClusterSize: 2, desiredClusterSize: 2, nodeInstanceType: 't3.medium' },
    cluster: {
      name: 'cluster',
      engine: 'ecs',
      weight: 0,
      port: 443,
      connection: {
        endpoint: 'ecs.{{region}}.amazonaws.com',
        credentialRef: '{{environment}}-{{consumer}}-task-execution-role',
      },
    },
    ingress: {
      name: 'ingress',
      engine: 'application-load-balancer',
      weight: 200,
      port: 443,
      connection: {
        endpoint: '{{host}}',
        credentialRef: '{{environment}}-{{consumer}}-certificate',
      },
    },
    upstream: { endpoint: '{{host}}', credentialRef: INTERNAL_SERVICE_TOKEN },
  },
  apprunner: {
    backend: 'apprunner',
    modes: ['managed-dependencies'],
    hostTemplate: '{{environment}}-{{name}}.{{region}}.awsapprunner.com',
    // App Runner manages its own compute; sizing only shapes the VPC connector
    clusterDefaults: { minClusterSize: 1, maxClusterSize: 1, desiredClusterSize: 1, nodeInstanceType: 'none' },
    upstream: { endpoint: '{{host}}', credentialRef: INTERNAL_SERVICE_TOKEN },
  },
};

export function getBackendProfile(backend: Backend): BackendProfile {
  return PROFILES[backend];
}

/**
 * Validate a backend/mode pair, typically straight from the command line
 */
export function parseTarget(backend: string, mode: string): DeploymentTarget {
  if (!isBackend(backend)) {
    throw new UnsupportedTargetError(backend, mode, `unknown backend (expected one of ${BACKENDS.join(', ')})`);
  }
  if (!isMode(mode)) {
    throw new UnsupportedTargetError(backend, mode, `unknown mode (expected one of ${MODES.join(', ')})`);
  }
  const profile = getBackendProfile(backend);
  if (!profile.modes.includes(mode)) {
    throw new UnsupportedTargetError(backend, mode, `${backend} supports only ${profile.modes.join(', ')}`);
  }
  return Object.freeze({ backend, mode });
}
