/**
 * Resource Domain Types
 *
 * A Resource is a library entry: a title, an optional description, an
 * optional attached file and a set of comma-separated tags. Each resource
 * exclusively owns its images; deleting a resource deletes them too.
 *
 * This module contains only pure TypeScript types with no runtime
 * dependencies.
 */

import type { ResourceImage } from './image';

/**
 * Resource as the repositories return it, with its images attached.
 *
 * @example
 * ```typescript
 * const resource: Resource = {
 *   id: 1,
 *   title: 'Intro to Watercolour',
 *   description: null,
 *   resourceFile: 'resources/1/files/syllabus.pdf',
 *   tags: 'art, painting',
 *   createdAt: new Date('2024-03-01T09:00:00Z'),
 *   updatedAt: new Date('2024-03-01T09:00:00Z'),
 *   images: [],
 * };
 * ```
 */
export interface Resource {
  /** Auto-incremented identifier assigned on creation */
  id: number;

  /** Non-empty title with surrounding whitespace removed */
  title: string;

  /** Free-form description, or null when none was given */
  description: string | null;

  /**
   * Blob key of the attached file (e.g. 'resources/1/files/notes.pdf'),
   * or null when the resource has no file.
   */
  resourceFile: string | null;

  /** Normalized tag string ('a, b, c'); empty when untagged */
  tags: string;

  /** Set once at creation */
  createdAt: Date;

  /** Moves forward on every mutation of the resource row */
  updatedAt: Date;

  /** Owned images in insertion order */
  images: ResourceImage[];
}
