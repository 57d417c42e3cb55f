export * from './errors';
export * from './schema';
export * from './resource';
export * from './patch';
