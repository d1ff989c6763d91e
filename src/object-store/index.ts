export * from './location-format';
export * from './object-storage';
export * from './results-store-gateway';
export * from './s3-provider';
