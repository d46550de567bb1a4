/**
 * SCHEDULER MODULE — Index
 */

export * from './scheduler.service.js';
