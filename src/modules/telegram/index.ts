/**
 * TELEGRAM MODULE — Index
 */

export * from './telegram.types.js';
export * from './telegram.client.js';
export * from './telegram.poller.js';
export * from './telegram.webhook.routes.js';
