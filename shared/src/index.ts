export * from './utils/Logger';
export * from './errors/ServiceError';
export * from './errorhandler';
export * from './config/env';
export * from './http/createServiceAxios';
export * from './caching/DiskCache';
export * from './pipeline/types';
export * from './pipeline/freeze';
export * from './pipeline/Pipeline';
export * from './pipeline/CachedServiceClient';
export * from './presenters/tabular';
export * from './presenters/fileEnvelope';
export * from './presenters/textTable';
export * from './presenters/barChart';
