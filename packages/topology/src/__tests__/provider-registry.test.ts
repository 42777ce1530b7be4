import { describe, it, expect, vi } from 'vitest';
import { ProviderRegistry } from '../registry/provider-registry.js';
import { createDefaultRegistry } from '../registry/storefront-providers.js';
import { AmbiguousProviderError, NoProviderError, RegistryError } from '../errors.js';
import { makeInClusterProvider, makeProvider } from './fixtures.js';

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

describe('ProviderRegistry', () => {
  describe('construction', () => {
    it('rejects duplicate provider ids', () => {
      expect(
        () =>
          new ProviderRegistry([
            makeProvider({ id: 'rds', kind: 'relational-store' }),
            makeProvider({ id: 'rds', kind: 'cache' }),
          ])
      ).toThrow("Invalid provider registry: duplicate provider id 'rds'");
    });

    it('rejects in-cluster providers on backends without a cluster', () => {
      expect(
        () => new ProviderRegistry([makeInClusterProvider({ id: 'redis', kind: 'cache', backends: ['apprunner'] })])
      ).toThrow(RegistryError);
    });

    it('rejects in-cluster providers registered for managed dependencies', () => {
      expect(
        () =>
          new ProviderRegistry([
            makeInClusterProvider({ id: 'redis', kind: 'cache', mode: 'managed-dependencies' }),
          ])
      ).toThrow("Invalid provider registry: provider 'redis' runs in-cluster but is registered for managed-dependencies");
    });

    it('rejects empty connection templates and bad ports', () => {
      expect(
        () =>
          new ProviderRegistry([
            makeProvider({ id: 'rds', kind: 'relational-store', connection: { endpoint: '', credentialRef: 'x' } }),
          ])
      ).toThrow(RegistryError);
      expect(() => new ProviderRegistry([makeProvider({ id: 'rds', kind: 'relational-store', port: 0 })])).toThrow(
        RegistryError
      );
    });

    it('rejects a priority that is not a finite number', () => {
      expect(() => new ProviderRegistry([makeProvider({ id: 'elasticache', kind: 'cache', priority: NaN })])).toThrow(
        "Invalid provider registry: provider 'elasticache' has a non-finite priority"
      );
      expect(
        () => new ProviderRegistry([makeProvider({ id: 'elasticache', kind: 'cache', priority: Infinity })])
      ).toThrow(RegistryError);
    });

    it('lists providers sorted by id regardless of registration order', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'sqs', kind: 'queue' }),
        makeProvider({ id: 'dynamodb', kind: 'document-store' }),
      ]);

      expect(registry.list().map(p => p.id)).toEqual(['dynamodb', 'sqs']);
      expect(registry.get('sqs')?.kind).toBe('queue');
      expect(registry.get('missing')).toBeUndefined();
    });
  });

  describe('providersFor', () => {
    const registry = new ProviderRegistry([
      makeProvider({ id: 'rds', kind: 'relational-store' }),
      makeInClusterProvider({ id: 'postgres', kind: 'relational-store' }),
      makeProvider({ id: 'any-store', kind: 'relational-store', mode: 'any', backends: ['ecs-default'] }),
    ]);

    it('matches kind, backend and mode', () => {
      expect(registry.providersFor('relational-store', 'eks-default', 'managed-dependencies').map(p => p.id)).toEqual([
        'rds',
      ]);
      expect(registry.providersFor('relational-store', 'eks-minimal', 'in-cluster-dependencies').map(p => p.id)).toEqual([
        'postgres',
      ]);
    });

    it('includes fallback providers registered for any mode', () => {
      expect(registry.providersFor('relational-store', 'ecs-default', 'managed-dependencies').map(p => p.id)).toEqual([
        'any-store',
        'rds',
      ]);
    });

    it('returns an empty list when nothing is registered', () => {
      expect(registry.providersFor('queue', 'apprunner', 'managed-dependencies')).toEqual([]);
    });
  });

  describe('selectProvider', () => {
    it('selects the managed provider for managed dependencies and the in-cluster one otherwise', () => {
      const registry = createDefaultRegistry();

      expect(registry.selectProvider('relational-store', 'eks-default', 'managed-dependencies').id).toBe('rds-postgres');
      expect(registry.selectProvider('relational-store', 'eks-minimal', 'in-cluster-dependencies').id).toBe('postgres');
    });

    it('prefers an exact mode match over a fallback', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'rds', kind: 'relational-store' }),
        makeProvider({ id: 'any-store', kind: 'relational-store', mode: 'any', priority: 100 }),
      ]);

      expect(registry.selectProvider('relational-store', 'eks-default', 'managed-dependencies').id).toBe('rds');
    });

    it('uses a fallback when no provider matches the mode exactly', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'any-store', kind: 'relational-store', mode: 'any', backends: ['eks-default'] }),
      ]);

      expect(registry.selectProvider('relational-store', 'eks-default', 'in-cluster-dependencies').id).toBe('any-store');
    });

    it('breaks ties with an explicit priority', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'aurora', kind: 'relational-store', priority: 2 }),
        makeProvider({ id: 'rds', kind: 'relational-store', priority: 1 }),
      ]);

      expect(registry.selectProvider('relational-store', 'ecs-default', 'managed-dependencies').id).toBe('aurora');
    });

    it('ranks a prioritized provider above unprioritized ones', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'aurora', kind: 'relational-store' }),
        makeProvider({ id: 'rds', kind: 'relational-store', priority: 0 }),
      ]);

      expect(registry.selectProvider('relational-store', 'ecs-default', 'managed-dependencies').id).toBe('rds');
    });

    it('fails with AmbiguousProviderError when nothing separates two providers', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'rds', kind: 'relational-store' }),
        makeProvider({ id: 'aurora', kind: 'relational-store' }),
      ]);

      let thrown: unknown;
      try {
        registry.selectProvider('relational-store', 'eks-default', 'managed-dependencies');
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(AmbiguousProviderError);
      expect(thrown).toMatchObject({ providers: ['aurora', 'rds'] });
    });

    it('fails with AmbiguousProviderError when the top priorities tie', () => {
      const registry = new ProviderRegistry([
        makeProvider({ id: 'rds', kind: 'relational-store', priority: 5 }),
        makeProvider({ id: 'aurora', kind: 'relational-store', priority: 5 }),
        makeProvider({ id: 'legacy', kind: 'relational-store', priority: 1 }),
      ]);

      expect(() => registry.selectProvider('relational-store', 'eks-default', 'managed-dependencies')).toThrow(
        AmbiguousProviderError
      );
    });

    it('fails with NoProviderError naming the consumer', () => {
      const registry = createDefaultRegistry();

      expect(() => registry.selectProvider('queue', 'apprunner', 'managed-dependencies', 'orders')).toThrow(
        "service 'orders' requires queue, but no provider for queue is registered on apprunner/managed-dependencies"
      );
      expect(() => registry.selectProvider('queue', 'apprunner', 'managed-dependencies')).toThrow(NoProviderError);
    });
  });
});
