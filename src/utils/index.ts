/**
 * @arch hexgraph.util.barrel
 */
export * from './errors.js';
export * from './logger.js';
export * from './file-system.js';
export * from './yaml.js';
export * from './format.js';
