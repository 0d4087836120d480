export { decodeTags, encodeTags, normalizeTags, TAG_SEPARATOR } from './tag-codec';
