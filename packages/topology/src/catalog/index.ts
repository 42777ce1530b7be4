export { loadCatalog, getServiceSpec } from './load-catalog.js';
export { catalogSchema, serviceSchema, type CatalogInput, type ServiceInput } from './schema.js';
export { STOREFRONT_SERVICES } from './storefront-services.js';
