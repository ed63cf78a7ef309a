export * from './errors';
export * from './frame';
export * from './archive';
export * from './canonical';
export * from './integrity';
export * from './filter';
export * from './datasets';
export * from './cacheStore';
export * from './operations';
