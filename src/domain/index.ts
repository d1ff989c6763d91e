/**
 * Domain model exports.
 */

export * from './artifact';
export * from './credential-redaction';
export * from './errors';
export * from './events';
export * from './job';
export * from './run';
