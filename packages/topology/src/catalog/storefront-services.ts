/**
 * Storefront Service Catalog
 *
 * The sample e-commerce application deployed by this repository. Every
 * deployment target is resolved from this one definition.
 */

import type { CatalogInput } from './schema.js';

export const STOREFRONT_SERVICES: CatalogInput = [
  {
    name: 'catalog',
    port: 8080,
    requires: [{ kind: 'relational-store', access: 'read', dedicated: true }],
    resources: { cpu: 'small', memory: 'small' },
  },
  {
    name: 'carts',
    port: 8080,
    requires: [{ kind: 'document-store', access: 'write' }],
    resources: { cpu: 'small', memory: 'medium' },
  },
  {
    name: 'orders',
    port: 8080,
    requires: [{ kind: 'relational-store', access: 'write', dedicated: true }],
    // Order events are published when a queue is available; orders still work without one
    optional: [{ kind: 'queue', access: 'write' }],
    resources: { cpu: 'small', memory: 'medium' },
  },
  {
    name: 'checkout',
    port: 8080,
    requires: [{ kind: 'cache', access: 'write' }],
    upstreams: ['orders'],
    resources: { cpu: 'small', memory: 'small' },
  },
  {
    name: 'ui',
    port: 8080,
    exposure: 'external',
    upstreams: ['catalog', 'carts', 'orders', 'checkout'],
    resources: { cpu: 'medium', memory: 'medium' },
  },
];
