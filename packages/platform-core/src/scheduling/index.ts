export type * from './types';
export { BaseScheduler } from './BaseScheduler';
export { PeriodicTask } from './PeriodicTask';
