export * from './listing.types';
export * from './job.types';
