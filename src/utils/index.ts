/**
 * Utility functions
 */

export * from './types';
export * from './stringParsing';
export * from './errorFormatter';
export * from './timing';
export * from './debug';
