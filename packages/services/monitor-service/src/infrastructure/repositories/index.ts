export { InMemoryEndpointRepository } from './InMemoryEndpointRepository';
export { InMemoryProbeResultRepository } from './InMemoryProbeResultRepository';
export { InMemoryNotificationLogRepository } from './InMemoryNotificationLogRepository';
export { DrizzleEndpointRepository } from './DrizzleEndpointRepository';
export { DrizzleProbeResultRepository } from './DrizzleProbeResultRepository';
export { DrizzleNotificationLogRepository } from './DrizzleNotificationLogRepository';
export { loadEndpointsFile } from './loadEndpointsFile';
