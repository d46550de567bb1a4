/**
 * PIPELINE MODULE — Index
 */

export * from './pipeline.types.js';
export * from './pipeline.messages.js';
export * from './pipeline.service.js';
