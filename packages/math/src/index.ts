/**
 * mixgate math public surface. Pure, side-effect free statistics used by the correlation analysis harness.
 */
export * from './timing'
export * from './entropy'
export * from './linkage'
