/**
 * mixgate DTO package public surface.
 * Re-exports stable enums, reason codes and the batch data model shared by every package.
 */
export * from './enums';
export * from './reasons';
export * from './batch';
