export * from './memory-store';
export * from './postgres-store';
export * from './store';
