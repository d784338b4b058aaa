/**
 * feegate DTO package public surface.
 * Re-exports stable enums, reason codes and the value types shared by every package.
 */
export * from './enums';
export * from './reasons';
export * from './types';
