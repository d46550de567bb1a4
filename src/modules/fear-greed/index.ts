/**
 * FEAR & GREED MODULE — Index
 */

export * from './fear-greed.types.js';
export * from './fear-greed.labels.js';
export * from './fear-greed.components.js';
export * from './fear-greed.schema.js';
export * from './fear-greed.client.js';
