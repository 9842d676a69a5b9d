// Export the validator protocol and library

export * from './validator.js';
export * from './validators.js';
