/**
 * Accepted input media and the MIME types sent to the provider.
 */

import { extname } from 'path';

export const VIDEO_MIME_TYPES = {
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  avi: 'video/x-msvideo',
  mkv: 'video/x-matroska',
} as const;

export const IMAGE_MIME_TYPES = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
} as const;

export type VideoExtension = keyof typeof VIDEO_MIME_TYPES;
export type ImageExtension = keyof typeof IMAGE_MIME_TYPES;
export type MediaKind = 'video' | 'image';

export const ACCEPTED_VIDEO_EXTENSIONS = Object.keys(VIDEO_MIME_TYPES);
export const ACCEPTED_IMAGE_EXTENSIONS = Object.keys(IMAGE_MIME_TYPES);

/** Lower-cased extension without the dot ("Clip.MOV" -> "mov"). */
export function extensionOf(filePath: string): string {
  return extname(filePath).slice(1).toLowerCase();
}

function isVideoExtension(ext: string): ext is VideoExtension {
  return Object.hasOwn(VIDEO_MIME_TYPES, ext);
}

function isImageExtension(ext: string): ext is ImageExtension {
  return Object.hasOwn(IMAGE_MIME_TYPES, ext);
}

/**
 * MIME type for an accepted media file, or null when the extension is not
 * accepted for that kind.
 */
export function mimeTypeFor(filePath: string, kind: MediaKind): string | null {
  const ext = extensionOf(filePath);
  if (kind === 'video') {
    return isVideoExtension(ext) ? VIDEO_MIME_TYPES[ext] : null;
  }
  return isImageExtension(ext) ? IMAGE_MIME_TYPES[ext] : null;
}
