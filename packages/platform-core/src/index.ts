/**
 * @beacon/platform-core
 *
 * Shared infrastructure for Beacon services: logging, errors, resilience, scheduling, HTTP
 */

export * from './logging';
export * from './error-handling';
export * from './resilience';
export * from './scheduling';
export * from './lifecycle';
export * from './http';
