/**
 * COMMANDS MODULE — Index
 */

export * from './command.parser.js';
export * from './command.router.js';
