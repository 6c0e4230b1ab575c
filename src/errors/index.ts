/**
 * Error module - exports all psgraph error types.
 */

export { PsGraphError } from './base.ts';
export { ConfigurationError } from './configuration-error.ts';
export { ResourceError } from './resource-error.ts';
export { DataShapeError } from './data-shape-error.ts';
