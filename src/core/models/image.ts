/**
 * ResourceImage Domain Types
 *
 * An image attached to a Resource. Images are created after their owning
 * resource exists and are deleted either on their own or together with the
 * resource.
 */

export interface ResourceImage {
  /** Auto-incremented identifier assigned on upload */
  id: number;

  /** Owning resource; fixed for the image's lifetime */
  resourceId: number;

  /** Blob key of the image (e.g. 'resources/1/images/cover.png') */
  image: string;

  /** Caption text, empty string when none was given */
  caption: string;

  /** Set once at upload */
  uploadedAt: Date;
}
