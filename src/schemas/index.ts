export * from './diagnostic-record.schema.js';
export * from './analysis-service.schema.js';
export * from './inventory.schema.js';
export * from './analyze-request.schema.js';
