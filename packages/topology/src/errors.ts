import { DetailedDomainError, DomainErrorCode } from '@storefront/platform-core';
import type { Backend, DependencyKind, Mode } from './types.js';

/**
 * Base of every resolution failure. None of these is transient: they all point
 * at catalog, registry or settings data that has to be fixed before resolving again.
 */
export class TopologyError extends DetailedDomainError {
  constructor(code: DomainErrorCode, message: string, details?: Record<string, unknown>, cause?: Error) {
    super(code, message, 422, { domain: 'topology', ...details }, cause);
    this.name = 'TopologyError';
  }
}

export class CatalogError extends TopologyError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(DomainErrorCode.VALIDATION_ERROR, `Invalid service catalog: ${message}`, details, cause);
    this.name = 'CatalogError';
  }
}

export class RegistryError extends TopologyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DomainErrorCode.VALIDATION_ERROR, `Invalid provider registry: ${message}`, details);
    this.name = 'RegistryError';
  }
}

export class NoProviderError extends TopologyError {
  readonly service?: string;
  readonly kind: DependencyKind;

  constructor(kind: DependencyKind, backend: Backend, mode: Mode, service?: string) {
    const consumer = service ? `service '${service}' requires ${kind}, but ` : '';
    super(
      DomainErrorCode.NOT_FOUND,
      `${consumer}no provider for ${kind} is registered on ${backend}/${mode}`,
      { ...(service && { service }), kind, backend, mode }
    );
    this.name = 'NoProviderError';
    this.service = service;
    this.kind = kind;
  }
}

export class AmbiguousProviderError extends TopologyError {
  readonly providers: readonly string[];

  constructor(kind: DependencyKind, backend: Backend, mode: Mode, providers: readonly string[]) {
    super(
      DomainErrorCode.CONFLICT,
      `${providers.length} providers qualify for ${kind} on ${backend}/${mode} (${providers.join(', ')}); set distinct priorities in the registry`,
      { kind, backend, mode, providers: [...providers] }
    );
    this.name = 'AmbiguousProviderError';
    this.providers = providers;
  }
}

export class CycleError extends TopologyError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(DomainErrorCode.INTERNAL_ERROR, `Dependency cycle detected: ${cycle.join(' -> ')}`, { cycle: [...cycle] });
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export class UnresolvedTemplateError extends TopologyError {
  readonly field: string;

  constructor(field: string, template: string, edgeId: string) {
    super(
      DomainErrorCode.INTERNAL_ERROR,
      `Cannot bind edge ${edgeId}: template '${template}' references unknown field '${field}'`,
      { field, template, edge: edgeId }
    );
    this.name = 'UnresolvedTemplateError';
    this.field = field;
  }
}

export class UnsupportedTargetError extends TopologyError {
  constructor(backend: string, mode: string, reason: string) {
    super(DomainErrorCode.VALIDATION_ERROR, `Unsupported deployment target ${backend}/${mode}: ${reason}`, {
      backend,
      mode,
    });
    this.name = 'UnsupportedTargetError';
  }
}

export class InvariantError extends TopologyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DomainErrorCode.INTERNAL_ERROR, `Topology invariant violated: ${message}`, details);
    this.name = 'InvariantError';
  }
}

export class InvalidSettingsError extends TopologyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(DomainErrorCode.VALIDATION_ERROR, `Invalid resolution settings: ${message}`, details);
    this.name = 'InvalidSettingsError';
  }
}
