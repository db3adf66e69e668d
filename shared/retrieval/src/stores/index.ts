export * from './vectorStore.interface';
export * from './failures';
export * from './retryPolicy';
export * from './qdrantStore';
export * from './memoryStore';
