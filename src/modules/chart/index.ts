/**
 * CHART MODULE — Index
 */

export * from './chart.types.js';
export * from './chart.scale.js';
export * from './chart.svg.js';
export * from './chart.renderer.js';
