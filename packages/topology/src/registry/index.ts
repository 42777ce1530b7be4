export { ProviderRegistry } from './provider-registry.js';
export { STOREFRONT_PROVIDERS, createDefaultRegistry } from './storefront-providers.js';
