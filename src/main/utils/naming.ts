const MEDIA_MARKER = 'media';
const FALLBACK_NAME = 'image';
const DEFAULT_EXT = '.jpg';

export interface MediaInfo {
  mediaId: string;
  variant: string;
}

const pathSegments = (url: string): string[] => {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  return pathname.replace(/^\/+|\/+$/g, '').split('/');
};

const findMediaInfo = (segments: string[]): MediaInfo | undefined => {
  const index = segments.indexOf(MEDIA_MARKER);
  if (index < 0 || index + 1 >= segments.length) {
    return undefined;
  }
  return {
    mediaId: segments[index + 1],
    variant: segments[index + 2] ?? 'file'
  };
};

export const extractMediaInfo = (url: string): MediaInfo => findMediaInfo(pathSegments(url)) ?? { mediaId: '', variant: '' };

export const filenameFromUrl = (url: string): string => {
  const segments = pathSegments(url);
  const info = findMediaInfo(segments);
  if (info) {
    return `${info.mediaId}_${info.variant}${DEFAULT_EXT}`;
  }
  // Any extension in the URL stays part of the stem.
  const last = segments[segments.length - 1];
  return `${last || FALLBACK_NAME}${DEFAULT_EXT}`;
};
