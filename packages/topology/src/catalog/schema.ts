import { z } from 'zod';

// Single hyphens only: names become DNS labels and upper-snake environment keys
const SERVICE_NAME = /^[a-z](?:[a-z0-9]|-(?!-))*[a-z0-9]$/;

// Kinds stay plain strings here so the loader can name an unknown kind in its error
const dependencyObjectSchema = z.object({
  kind: z.string().min(1),
  access: z.enum(['read', 'write']).default('read'),
  dedicated: z.boolean().default(false),
});

export const dependencySchema = z.union([
  z.string().min(1).transform(kind => ({ kind, access: 'read' as const, dedicated: false })),
  dependencyObjectSchema,
]);

export const serviceSchema = z.object({
  name: z
    .string()
    .max(40)
    .regex(SERVICE_NAME, 'must be lowercase kebab-case without doubled hyphens'),
  port: z.number().int().min(1).max(65535).default(8080),
  requires: z.array(dependencySchema).default([]),
  optional: z.array(dependencySchema).default([]),
  upstreams: z.array(z.string()).default([]),
  exposure: z.enum(['internal', 'external']).default('internal'),
  resources: z
    .object({
      cpu: z.string().default('default'),
      memory: z.string().default('default'),
    })
    .default({}),
});

export const catalogSchema = z.array(serviceSchema);

export type ServiceInput = z.input<typeof serviceSchema>;
export type CatalogInput = z.input<typeof catalogSchema>;
export type ParsedService = z.output<typeof serviceSchema>;
