// Export shared model types

export * from './types.js';
