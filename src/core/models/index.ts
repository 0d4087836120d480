/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import type { Resource, ResourceImage } from '@/core/models';
 * ```
 */

export type { Resource } from './resource';
export type { ResourceImage } from './image';
