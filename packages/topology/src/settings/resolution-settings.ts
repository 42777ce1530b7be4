/**
 * Resolution Settings
 *
 * Per-run values that are not part of the catalog or the registry: the
 * environment name used in resource names, the AWS region, the namespace
 * workloads land in, and the cluster/network sizing of the target.
 */

import { z } from 'zod';
import { getStringConfig } from '@storefront/platform-core';
import { getBackendProfile } from '../backends/profiles.js';
import { InvalidSettingsError } from '../errors.js';
import type { Backend } from '../types.js';

const DNS_LABEL = /^[a-z][a-z0-9-]*[a-z0-9]$/;
const IPV4_CIDR = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

function isValidCidr(value: string): boolean {
  const match = IPV4_CIDR.exec(value);
  if (!match) return false;
  const [, ...parts] = match;
  const octets = parts.slice(0, 4).map(Number);
  const prefix = Number(parts[4]);
  return octets.every(octet => octet <= 255) && prefix >= 8 && prefix <= 28;
}

export const resolutionSettingsSchema = z
  .object({
    environment: z.string().max(20).regex(DNS_LABEL, 'must be a lowercase DNS label'),
    region: z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d$/, 'must be an AWS region such as us-east-1'),
    namespace: z.string().max(63).regex(DNS_LABEL, 'must be a lowercase DNS label'),
    vpcNetworkCidr: z.string().refine(isValidCidr, 'must be an IPv4 CIDR block between /8 and /28'),
    cluster: z.object({
      minClusterSize: z.coerce.number().int().min(1),
      maxClusterSize: z.coerce.number().int().min(1),
      desiredClusterSize: z.coerce.number().int().min(1),
      nodeInstanceType: z.string().min(1),
    }),
  })
  .superRefine((settings, ctx) => {
    const { minClusterSize, maxClusterSize, desiredClusterSize } = settings.cluster;
    if (minClusterSize > maxClusterSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cluster', 'minClusterSize'],
        message: `minClusterSize (${minClusterSize}) exceeds maxClusterSize (${maxClusterSize})`,
      });
    }
    if (desiredClusterSize < minClusterSize || desiredClusterSize > maxClusterSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cluster', 'desiredClusterSize'],
        message: `desiredClusterSize (${desiredClusterSize}) must lie between ${minClusterSize} and ${maxClusterSize}`,
      });
    }
  });

export type ResolutionSettings = z.output<typeof resolutionSettingsSchema>;

export interface SettingsOverrides {
  environment?: string;
  region?: string;
  namespace?: string;
  vpcNetworkCidr?: string;
  cluster?: Partial<ResolutionSettings['cluster']>;
}

export const SETTINGS_ENV_VARS = {
  environment: 'DEPLOY_ENVIRONMENT',
  region: 'AWS_REGION',
  namespace: 'DEPLOY_NAMESPACE',
  vpcNetworkCidr: 'VPC_NETWORK_CIDR',
  minClusterSize: 'MIN_CLUSTER_SIZE',
  maxClusterSize: 'MAX_CLUSTER_SIZE',
  desiredClusterSize: 'DESIRED_CLUSTER_SIZE',
  nodeInstanceType: 'EKS_NODE_INSTANCE_TYPE',
} as const;

export function validateResolutionSettings(input: unknown): ResolutionSettings {
  const result = resolutionSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map(issue => ({ field: issue.path.join('.'), message: issue.message }));
    throw new InvalidSettingsError(issues.map(i => `${i.field}: ${i.message}`).join('; '), { issues });
  }
  return Object.freeze({ ...result.data, cluster: Object.freeze({ ...result.data.cluster }) });
}

/**
 * Backend defaults, overridden by environment variables, overridden by explicit values
 */
export function loadResolutionSettings(
  backend: Backend,
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {}
): ResolutionSettings {
  const defaults = getBackendProfile(backend).clusterDefaults;
  const read = (key: string, fallback: string | number): string =>
    getStringConfig(key, String(fallback), env);

  return validateResolutionSettings({
    environment: overrides.environment ?? read(SETTINGS_ENV_VARS.environment, 'dev'),
    region: overrides.region ?? read(SETTINGS_ENV_VARS.region, 'us-east-1'),
    namespace: overrides.namespace ?? read(SETTINGS_ENV_VARS.namespace, 'storefront'),
    vpcNetworkCidr: overrides.vpcNetworkCidr ?? read(SETTINGS_ENV_VARS.vpcNetworkCidr, '10.0.0.0/16'),
    cluster: {
      minClusterSize: overrides.cluster?.minClusterSize ?? read(SETTINGS_ENV_VARS.minClusterSize, defaults.minClusterSize),
      maxClusterSize: overrides.cluster?.maxClusterSize ?? read(SETTINGS_ENV_VARS.maxClusterSize, defaults.maxClusterSize),
      desiredClusterSize:
        overrides.cluster?.desiredClusterSize ?? read(SETTINGS_ENV_VARS.desiredClusterSize, defaults.desiredClusterSize),
      nodeInstanceType: overrides.cluster?.nodeInstanceType ?? read(SETTINGS_ENV_VARS.nodeInstanceType, defaults.nodeInstanceType),
    },
  });
}
