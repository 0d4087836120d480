export type { BlobStore, UploadedFile } from './types';
export { LocalBlobStore, InvalidBlobKeyError } from './local-blob-store';
export { resourceFileKey, resourceImageKey, safeFilename, withSuffix } from './keys';
