import { BACKENDS, type ProviderDefinition } from '../types.js';

export function makeProvider(
  overrides: Partial<ProviderDefinition> & Pick<ProviderDefinition, 'id' | 'kind'>
): ProviderDefinition {
  return {
    backends: BACKENDS,
    mode: 'managed-dependencies',
    weight: 10,
    port: 5432,
    placement: 'managed',
    connection: {
      endpoint: '{{name}}.{{region}}.example.internal',
      credentialRef: '{{environment}}/{{name}}',
    },
    ...overrides,
  };
}

export function makeInClusterProvider(
  overrides: Partial<ProviderDefinition> & Pick<ProviderDefinition, 'id' | 'kind'>
): ProviderDefinition {
  return makeProvider({
    backends: ['eks-default', 'eks-minimal'],
    mode: 'in-cluster-dependencies',
    placement: 'in-cluster',
    connection: { endpoint: '{{host}}', credentialRef: '{{name}}-credentials' },
    ...overrides,
  });
}
