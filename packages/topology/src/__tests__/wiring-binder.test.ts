import { describe, it, expect, vi } from 'vitest';
import { WiringBinder, toEnvKey } from '../binder/wiring-binder.js';
import { TopologyResolver } from '../resolver/topology-resolver.js';
import { ProviderRegistry } from '../registry/provider-registry.js';
import { createDefaultRegistry } from '../registry/storefront-providers.js';
import { loadCatalog } from '../catalog/load-catalog.js';
import { loadResolutionSettings } from '../settings/resolution-settings.js';
import type { DeploymentTarget, ServiceSpec } from '../types.js';
import { InvariantError, UnresolvedTemplateError } from '../errors.js';
import { makeProvider } from './fixtures.js';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('@storefront/platform-core', async importOriginal => {
  const actual = await importOriginal<typeof import('@storefront/platform-core')>();
  return {
    ...actual,
    getLogger: vi.fn(() => mockLogger),
  };
});

function bind(target: DeploymentTarget, catalogInput?: unknown, registry: ProviderRegistry = createDefaultRegistry()) {
  const settings = loadResolutionSettings(target.backend, {});
  const graph = new TopologyResolver(loadCatalog(catalogInput), registry, settings).resolveGraph(target);
  return { graph, ...new WiringBinder(settings).bind(graph) };
}

describe('WiringBinder', () => {
  describe('eks-default with managed dependencies', () => {
    const { graph, facts, bundles } = bind({ backend: 'eks-default', mode: 'managed-dependencies' });
    const fact = (id: string) => facts.find(f => f.edgeId === id);

    it('binds exactly one fact per edge', () => {
      expect(facts.map(f => f.edgeId).sort()).toEqual(graph.edges.map(e => e.id));
    });

    it('renders managed store endpoints and secret references', () => {
      expect(fact('service:catalog->provider:catalog-rds-postgres')).toEqual({
        edgeId: 'service:catalog->provider:catalog-rds-postgres',
        consumer: 'service:catalog',
        target: 'provider:catalog-rds-postgres',
        relation: 'dependency',
        endpoint: 'dev-catalog-rds-postgres.us-east-1.rds.amazonaws.com',
        credentialRef: 'dev/catalog-rds-postgres/master-credentials',
        port: 5432,
      });
    });

    it('derives per-consumer credentials where the template asks for the service', () => {
      expect(fact('service:carts->provider:dynamodb')).toMatchObject({
        endpoint: 'dynamodb.us-east-1.amazonaws.com',
        credentialRef: 'dev-carts-dynamodb-access',
        port: 443,
      });
    });

    it('binds service calls to cluster DNS names', () => {
      expect(fact('service:checkout->service:orders')).toMatchObject({
        relation: 'upstream',
        endpoint: 'orders.storefront.svc.cluster.local',
        credentialRef: 'dev/internal-service-token',
        port: 8080,
      });
    });

    it('binds placement and routing to the shared infrastructure', () => {
      expect(fact('service:ui->infrastructure:cluster')).toMatchObject({
        endpoint: 'dev-cluster.eks.us-east-1.amazonaws.com',
        credentialRef: 'dev-cluster-kubeconfig',
        port: 443,
      });
      expect(fact('infrastructure:ingress->service:ui')).toMatchObject({
        endpoint: 'ui.storefront.svc.cluster.local',
        credentialRef: 'dev-ingress-tls',
        port: 8080,
      });
    });

    it('walks edges so that no fact precedes a fact about its consumer', () => {
      const position = new Map(graph.order.map((id, index) => [id, index]));
      const targets = facts.map(f => position.get(f.target) ?? -1);

      expect(targets).toEqual([...targets].sort((a, b) => a - b));
    });

    it('builds a configuration bundle per service in provisioning order', () => {
      expect(bundles.map(b => b.service)).toEqual(['carts', 'catalog', 'orders', 'checkout', 'ui']);
    });

    it('exposes dependency and upstream facts as environment variables', () => {
      const checkout = bundles.find(b => b.service === 'checkout');

      expect(checkout?.environment).toEqual({
        CACHE_CREDENTIALS_REF: 'dev/elasticache-redis/auth-token',
        CACHE_ENDPOINT: 'dev-elasticache-redis.cache.us-east-1.amazonaws.com',
        CACHE_PORT: '6379',
        ORDERS_SERVICE_CREDENTIALS_REF: 'dev/internal-service-token',
        ORDERS_SERVICE_ENDPOINT: 'orders.storefront.svc.cluster.local',
        ORDERS_SERVICE_PORT: '8080',
        ORDERS_SERVICE_URL: 'http://orders.storefront.svc.cluster.local:8080',
        PORT: '8080',
      });
      expect(Object.keys(checkout?.environment ?? {})).toEqual(Object.keys(checkout?.environment ?? {}).sort());
    });

    it('keeps placement facts in the bundle but out of the environment', () => {
      const carts = bundles.find(b => b.service === 'carts');

      expect(carts?.facts.map(f => f.relation).sort()).toEqual(['dependency', 'placement']);
      expect(Object.keys(carts?.environment ?? {})).toEqual([
        'DOCUMENT_STORE_CREDENTIALS_REF',
        'DOCUMENT_STORE_ENDPOINT',
        'DOCUMENT_STORE_PORT',
        'PORT',
      ]);
    });
  });

  it('binds in-cluster providers to cluster DNS names', () => {
    const { facts } = bind({ backend: 'eks-minimal', mode: 'in-cluster-dependencies' });

    expect(facts.find(f => f.edgeId === 'service:orders->provider:orders-postgres')).toMatchObject({
      endpoint: 'orders-postgres.storefront.svc.cluster.local',
      credentialRef: 'orders-postgres-credentials',
      port: 5432,
    });
    expect(facts.find(f => f.edgeId === 'provider:redis->infrastructure:cluster')).toMatchObject({
      credentialRef: 'dev-cluster-kubeconfig',
    });
  });

  it('uses Service Connect names and task roles on ECS', () => {
    const { facts } = bind({ backend: 'ecs-default', mode: 'managed-dependencies' });

    expect(facts.find(f => f.edgeId === 'service:ui->service:catalog')?.endpoint).toBe('catalog.storefront.local');
    expect(facts.find(f => f.edgeId === 'service:orders->infrastructure:cluster')).toMatchObject({
      endpoint: 'ecs.us-east-1.amazonaws.com',
      credentialRef: 'dev-orders-task-execution-role',
    });
  });

  it('uses App Runner service URLs', () => {
    const { facts } = bind({ backend: 'apprunner', mode: 'managed-dependencies' });

    expect(facts.find(f => f.edgeId === 'service:ui->service:carts')?.endpoint).toBe(
      'dev-carts.us-east-1.awsapprunner.com'
    );
  });

  it('fails with UnresolvedTemplateError when a template needs a field the target cannot supply', () => {
    const registry = new ProviderRegistry([
      makeProvider({
        id: 'rds',
        kind: 'relational-store',
        connection: { endpoint: '{{name}}.svc.{{clusterDomain}}', credentialRef: '{{name}}' },
      }),
    ]);

    let thrown: unknown;
    try {
      bind({ backend: 'apprunner', mode: 'managed-dependencies' }, [{ name: 'orders', requires: ['relational-store'] }], registry);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(UnresolvedTemplateError);
    expect(thrown).toMatchObject({ field: 'clusterDomain' });
  });

  it('fails on a placeholder outside the known fields', () => {
    const registry = new ProviderRegistry([
      makeProvider({
        id: 'rds',
        kind: 'relational-store',
        connection: { endpoint: '{{name}}', credentialRef: '{{masterPassword}}' },
      }),
    ]);

    expect(() =>
      bind({ backend: 'eks-default', mode: 'managed-dependencies' }, [{ name: 'orders', requires: ['relational-store'] }], registry)
    ).toThrow("references unknown field 'masterPassword'");
  });
});

describe('configuration bundles', () => {
  const spec = (name: string, upstreams: string[] = []): ServiceSpec => ({
    name,
    port: 8080,
    requires: [],
    optional: [],
    upstreams,
    exposure: 'internal',
    resources: { cpu: 'default', memory: 'default' },
  });

  it('refuses to let two upstreams share an environment key', () => {
    const target: DeploymentTarget = { backend: 'apprunner', mode: 'managed-dependencies' };
    const settings = loadResolutionSettings(target.backend, {});
    const catalog = [spec('pay-api'), spec('pay--api'), spec('web', ['pay-api', 'pay--api'])];
    const graph = new TopologyResolver(catalog, createDefaultRegistry(), settings).resolveGraph(target);

    expect(() => new WiringBinder(settings).bind(graph)).toThrow(InvariantError);
    expect(() => new WiringBinder(settings).bind(graph)).toThrow(
      'Topology invariant violated: service:pay-api and service:pay--api both map to PAY_API_SERVICE_URL in the environment of web'
    );
  });
});

describe('toEnvKey', () => {
  it('upper-snakes names', () => {
    expect(toEnvKey('relational-store')).toBe('RELATIONAL_STORE');
    expect(toEnvKey('search-svc')).toBe('SEARCH_SVC');
  });
});
