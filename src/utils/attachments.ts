import { extname } from 'path';

/** MIME type mapping for common attachment extensions */
const MIME_TYPES: Record<string, string> = {
  // Images
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.bmp': 'image/bmp',
  '.ico': 'image/x-icon',

  // Documents
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.log': 'text/plain',

  // Media
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',

  // Archives
  '.zip': 'application/zip',
  '.gz': 'application/gzip'
};

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

/**
 * Guess the MIME type from the file extension of a name or URL.
 * Query strings (CDN signatures) are ignored.
 */
export function getMimeType(nameOrUrl: string): string {
  let path = nameOrUrl;
  try {
    path = new URL(nameOrUrl).pathname;
  } catch {
    path = nameOrUrl.split('?')[0];
  }
  return MIME_TYPES[extname(path).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

/**
 * Strip parameters such as `; charset=utf-8` from a Content-Type header
 */
export function normalizeContentType(header: string | undefined): string | undefined {
  const type = header?.split(';')[0].trim().toLowerCase();
  return type ? type : undefined;
}

export function isImageType(mimeType: string | undefined): boolean {
  return mimeType?.startsWith('image/') ?? false;
}

export function toDataUri(content: Buffer, mimeType: string): string {
  return `data:${mimeType};base64,${content.toString('base64')}`;
}
