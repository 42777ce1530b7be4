export { getBackendProfile, parseTarget, SERVICE_WEIGHT } from './profiles.js';
export type { BackendProfile, ClusterDefaults, SharedInfrastructure } from './profiles.js';
