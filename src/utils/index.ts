/**
 * Utility functions for LineCalc
 */

export * from './errorFormatter';
export * from './config';
export * from './debug';
