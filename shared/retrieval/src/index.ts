export * from './errors';
export * from './chunker';
export * from './config';
export * from './embeddings';
export * from './stores';
export * from './storeFactory';
