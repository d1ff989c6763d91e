export * from './aws-batch-service';
export * from './compute-service';
