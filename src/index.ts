/**
 * Simulation run control.
 *
 * Job and run lifecycle, compute status reconciliation and crash-tolerant
 * results publishing. Hosts typically call loadRunControlConfig() and
 * createRunControl(), then drive the lifecycle, publisher and
 * synchronizer from their own HTTP or CLI layer.
 */

export * from './domain';
export * from './engine';
export * from './storage';
export * from './object-store';
export * from './compute';
export * from './packaging/results-packager';
export * from './data-plane/publisher';
export * from './config';
export * from './bootstrap';
export * from './logger';
