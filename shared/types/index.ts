export * from './chunk.types';
export * from './document.types';
export * from './job.types';
export * from './query.types';
export * from './vector.types';
