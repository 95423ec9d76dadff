import { createHash } from 'node:crypto';

const IMAGE_EXTENSION = /\.(jpe?g|png|gif)$/i;
const UNSAFE_CHARACTERS = /[^a-zA-Z0-9._-]/g;

function hashedName(text: string): string {
  const digest = createHash('md5').update(text).digest('hex');
  return `image_${digest.slice(0, 10)}.jpg`;
}

function decodeUrl(url: string): string {
  try {
    return decodeURIComponent(url);
  } catch (error) {
    console.warn(`⚠️  Could not decode image URL ${url}:`, error);
    return url;
  }
}

/**
 * resizeImage URLs carry the real image path in `src`; the last two
 * segments of that path identify the image.
 */
function fileNameFromResizeUrl(decoded: string): string {
  const queryStart = decoded.indexOf('?');
  const src = queryStart >= 0 ? new URLSearchParams(decoded.slice(queryStart + 1)).get('src') : null;
  if (!src) {
    return hashedName(decoded);
  }

  const parts = src.split('/');
  return parts.length >= 2 ? `${parts[parts.length - 2]}_${parts[parts.length - 1]}` : src;
}

function fileNameFromPath(decoded: string): string {
  const fileName = decoded.slice(decoded.lastIndexOf('/') + 1);
  if (!fileName || fileName.startsWith('?')) {
    return hashedName(decoded);
  }
  return fileName;
}

/**
 * Deterministic object-store key for a source image URL, `<folder>/<name>`.
 * The same URL always maps to the same key.
 */
export function blobNameFor(url: string, folder: string): string {
  const decoded = decodeUrl(url);
  let fileName = decoded.includes('resizeImage')
    ? fileNameFromResizeUrl(decoded)
    : fileNameFromPath(decoded);

  // Extension check runs before the query is cut; stored keys depend on this order
  if (!IMAGE_EXTENSION.test(fileName)) {
    fileName += '.jpg';
  }
  fileName = fileName.split('?')[0];

  return `${folder}/${fileName.replace(UNSAFE_CHARACTERS, '_')}`;
}
