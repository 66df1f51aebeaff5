/**
 * DTO package public surface.
 * Re-exports stable enums, decision shapes and reason codes. Only items exported here are published.
 */
export * from './enums';
export * from './reasons';
