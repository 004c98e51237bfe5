export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

// Downloads, proxied images and cached files
export const MAX_IMAGE_BYTES = 25 * 1024 * 1024;

export type ImageMime = 'image/jpeg' | 'image/png' | 'image/webp' | 'image/gif';

const EXTENSIONS: Record<ImageMime, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'image/gif': '.gif',
};

const ALLOWED_URL_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp', '.gif'];

/**
 * Detect the image format from its leading bytes. Returns null for anything
 * that is not JPEG, PNG, WEBP or GIF.
 */
export function sniffImageMime(data: Uint8Array): ImageMime | null {
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (
    data.length >= 8 &&
    data[0] === 0x89 &&
    data[1] === 0x50 &&
    data[2] === 0x4e &&
    data[3] === 0x47 &&
    data[4] === 0x0d &&
    data[5] === 0x0a &&
    data[6] === 0x1a &&
    data[7] === 0x0a
  ) {
    return 'image/png';
  }
  if (data.length >= 12 && ascii(data, 0, 4) === 'RIFF' && ascii(data, 8, 12) === 'WEBP') {
    return 'image/webp';
  }
  if (data.length >= 6 && (ascii(data, 0, 6) === 'GIF87a' || ascii(data, 0, 6) === 'GIF89a')) {
    return 'image/gif';
  }
  return null;
}

export function isImageContentType(contentType: string | undefined | null): boolean {
  if (!contentType) {
    return false;
  }
  return contentType.split(';', 1)[0].trim().toLowerCase().startsWith('image/');
}

export function extensionForMime(mime: string | null | undefined): string {
  if (!mime) {
    return '';
  }
  const normalized = mime.split(';', 1)[0].trim().toLowerCase();
  if (normalized === 'image/jpg') {
    return '.jpg';
  }
  return isImageMime(normalized) ? EXTENSIONS[normalized] : '';
}

export function extensionFromUrl(url: string): string {
  const path = url.split('?', 1)[0].split('#', 1)[0];
  const dot = path.lastIndexOf('.');
  if (dot < 0 || dot < path.lastIndexOf('/')) {
    return '';
  }
  const ext = path.slice(dot).toLowerCase();
  if (!ALLOWED_URL_EXTENSIONS.includes(ext)) {
    return '';
  }
  return ext === '.jpeg' ? '.jpg' : ext;
}

function isImageMime(value: string): value is ImageMime {
  return value in EXTENSIONS;
}

function ascii(data: Uint8Array, start: number, end: number): string {
  return String.fromCharCode(...data.subarray(start, end));
}
