export * from './results-publisher';
export * from './retry';
export * from './run-access';
export * from './run-lifecycle';
export * from './state-machine';
export * from './status-synchronizer';
