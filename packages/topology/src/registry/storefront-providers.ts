/**
 * Storefront Providers
 *
 * One managed and one in-cluster implementation per dependency kind. Managed
 * providers point at AWS services; in-cluster ones are workloads placed on the
 * backend's cluster and reached through its service discovery naming.
 */

import type { ProviderDefinition } from '../types.js';
import { ProviderRegistry } from './provider-registry.js';

const ALL_BACKENDS = ['eks-default', 'eks-minimal', 'ecs-default', 'apprunner'] as const;
const KUBERNETES = ['eks-default', 'eks-minimal'] as const;

// Stores before brokers, brokers before workloads
const STORE_WEIGHT = 10;
const BROKER_WEIGHT = 20;

export const STOREFRONT_PROVIDERS: readonly ProviderDefinition[] = [
  {
    id: 'rds-postgres',
    kind: 'relational-store',
    backends: ALL_BACKENDS,
    mode: 'managed-dependencies',
    weight: STORE_WEIGHT,
    port: 5432,
    placement: 'managed',
    connection: {
      endpoint: '{{environment}}-{{name}}.{{region}}.rds.amazonaws.com',
      credentialRef: '{{environment}}/{{name}}/master-credentials',
    },
  },
  {
    id: 'postgres',
    kind: 'relational-store',
    backends: KUBERNETES,
    mode: 'in-cluster-dependencies',
    weight: STORE_WEIGHT,
    port: 5432,
    placement: 'in-cluster',
    connection: {
      endpoint: '{{host}}',
      credentialRef: '{{name}}-credentials',
    },
  },
  {
    id: 'dynamodb',
    kind: 'document-store',
    backends: ALL_BACKENDS,
    mode: 'managed-dependencies',
    weight: STORE_WEIGHT,
    port: 443,
    placement: 'managed',
    connection: {
      endpoint: 'dynamodb.{{region}}.amazonaws.com',
      // DynamoDB is reached through the consumer's IAM role, not a password
      credentialRef: '{{environment}}-{{service}}-dynamodb-access',
    },
  },
  {
    id: 'dynamodb-local',
    kind: 'document-store',
    backends: KUBERNETES,
    mode: 'in-cluster-dependencies',
    weight: STORE_WEIGHT,
    port: 8000,
    placement: 'in-cluster',
    connection: {
      endpoint: '{{host}}',
      credentialRef: '{{name}}-credentials',
    },
  },
  {
    id: 'elasticache-redis',
    kind: 'cache',
    backends: ALL_BACKENDS,
    mode: 'managed-dependencies',
    weight: STORE_WEIGHT,
    port: 6379,
    placement: 'managed',
    connection: {
      endpoint: '{{environment}}-{{name}}.cache.{{region}}.amazonaws.com',
      credentialRef: '{{environment}}/{{name}}/auth-token',
    },
  },
  {
    id: 'redis',
    kind: 'cache',
    backends: KUBERNETES,
    mode: 'in-cluster-dependencies',
    weight: STORE_WEIGHT,
    port: 6379,
    placement: 'in-cluster',
    connection: {
      endpoint: '{{host}}',
      credentialRef: '{{name}}-auth',
    },
  },
  {
    // App Runner has no Amazon MQ integration; orders runs without events there
    id: 'amazon-mq-rabbitmq',
    kind: 'queue',
    backends: ['eks-default', 'eks-minimal', 'ecs-default'],
    mode: 'managed-dependencies',
    weight: BROKER_WEIGHT,
    port: 5671,
    placement: 'managed',
    connection: {
      endpoint: '{{environment}}-{{name}}.mq.{{region}}.amazonaws.com',
      credentialRef: '{{environment}}/{{name}}/broker-credentials',
    },
  },
  {
    id: 'rabbitmq',
    kind: 'queue',
    backends: KUBERNETES,
    mode: 'in-cluster-dependencies',
    weight: BROKER_WEIGHT,
    port: 5672,
    placement: 'in-cluster',
    connection: {
      endpoint: '{{host}}',
      credentialRef: '{{name}}-credentials',
    },
  },
];

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry(STOREFRONT_PROVIDERS);
}
