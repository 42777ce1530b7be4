import { z } from 'zod';
import { getLogger } from '@storefront/platform-core';
import { CatalogError } from '../errors.js';
import { isDependencyKind, type Catalog, type DependencyRequirement, type ServiceSpec } from '../types.js';
import { catalogSchema, type ParsedService } from './schema.js';
import { STOREFRONT_SERVICES } from './storefront-services.js';

const logger = getLogger('topology:catalog');

type ParsedDependency = ParsedService['requires'][number];

function formatIssues(error: z.ZodError): { field: string; message: string }[] {
  return error.errors.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

function toRequirement(service: string, dependency: ParsedDependency): DependencyRequirement {
  const { kind } = dependency;
  if (!isDependencyKind(kind)) {
    throw new CatalogError(`service '${service}' declares unknown dependency kind '${kind}'`, { service, kind });
  }
  return Object.freeze({ kind, access: dependency.access, dedicated: dependency.dedicated });
}

function toServiceSpec(parsed: ParsedService): ServiceSpec {
  const requires = parsed.requires.map(dep => toRequirement(parsed.name, dep));
  const optional = parsed.optional.map(dep => toRequirement(parsed.name, dep));

  const seen = new Set<string>();
  for (const { kind } of [...requires, ...optional]) {
    if (seen.has(kind)) {
      throw new CatalogError(`service '${parsed.name}' declares ${kind} more than once`, {
        service: parsed.name,
        kind,
      });
    }
    seen.add(kind);
  }

  return Object.freeze({
    name: parsed.name,
    port: parsed.port,
    requires: Object.freeze(requires),
    optional: Object.freeze(optional),
    upstreams: Object.freeze([...parsed.upstreams]),
    exposure: parsed.exposure,
    resources: Object.freeze({ ...parsed.resources }),
  });
}

function validateUpstreams(services: readonly ServiceSpec[]): void {
  const names = new Set(services.map(s => s.name));
  for (const service of services) {
    for (const upstream of service.upstreams) {
      if (upstream === service.name) {
        throw new CatalogError(`service '${service.name}' lists itself as an upstream`, { service: service.name });
      }
      if (!names.has(upstream)) {
        throw new CatalogError(`service '${service.name}' calls unknown service '${upstream}'`, {
          service: service.name,
          upstream,
        });
      }
    }
  }
}

/**
 * Validate a catalog declaration and return its services in declaration order.
 * Duplicate names are rejected, never overwritten.
 */
export function loadCatalog(input: unknown = STOREFRONT_SERVICES): Catalog {
  const result = catalogSchema.safeParse(input);
  if (!result.success) {
    throw new CatalogError('malformed service declaration', { issues: formatIssues(result.error) }, result.error);
  }

  const services: ServiceSpec[] = [];
  const names = new Set<string>();
  for (const parsed of result.data) {
    if (names.has(parsed.name)) {
      throw new CatalogError(`duplicate service name '${parsed.name}'`, { service: parsed.name });
    }
    names.add(parsed.name);
    services.push(toServiceSpec(parsed));
  }

  validateUpstreams(services);

  logger.debug('Service catalog loaded', { services: services.map(s => s.name) });
  return Object.freeze(services);
}

export function getServiceSpec(catalog: Catalog, name: string): ServiceSpec {
  const service = catalog.find(s => s.name === name);
  if (!service) {
    throw new CatalogError(`service '${name}' not found. Available services: ${catalog.map(s => s.name).join(', ')}`, {
      service: name,
    });
  }
  return service;
}
