// Export all services

export * from './config/config-service.js';
export * from './definition/definition-compiler.js';
export * from './report/report-service.js';
export * from './validation/validation-service.js';
