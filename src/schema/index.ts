// Export all element types

export * from './core.js';
export * from './scalars.js';
export * from './mappings.js';
export * from './sequences.js';
export * from './forms.js';
export * from './meta.js';
export { isPlainObject, toPlain } from './raw.js';
