import sharp from 'sharp';
import type { MetadataPatch } from '../../shared/types/fetch-outcome.js';
import { toExifTimestamp } from '../utils/date.js';
import { formatRationals, isValidCoordinatePair, latitudeRef, longitudeRef, toDmsRationals } from '../utils/gps.js';
import { errorMessage } from '../errors.js';

export const JPEG_QUALITY = 95;

type ExifDirectoryName = 'IFD0' | 'IFD2' | 'IFD3';

export type ExifDirectories = Partial<Record<ExifDirectoryName, Record<string, string>>>;

export interface RewriteResult {
  data: Buffer;
  advisory?: string;
}

export type MetadataRewriter = (raw: Buffer, patch: MetadataPatch) => Promise<RewriteResult>;

/**
 * Maps a patch onto the libvips EXIF directories: IFD0 is the primary
 * image directory, IFD2 the Exif sub-IFD and IFD3 the GPS directory.
 */
export const buildExifDirectories = (patch: MetadataPatch): ExifDirectories => {
  const directories: ExifDirectories = {};

  if (patch.capturedAt) {
    const stamp = toExifTimestamp(patch.capturedAt);
    directories.IFD0 = { DateTime: stamp };
    directories.IFD2 = { DateTimeOriginal: stamp, DateTimeDigitized: stamp };
  }

  if (
    typeof patch.latitude === 'number' &&
    typeof patch.longitude === 'number' &&
    isValidCoordinatePair(patch.latitude, patch.longitude)
  ) {
    directories.IFD3 = {
      GPSVersionID: '2 3 0 0',
      GPSLatitudeRef: latitudeRef(patch.latitude),
      GPSLatitude: formatRationals(toDmsRationals(patch.latitude)),
      GPSLongitudeRef: longitudeRef(patch.longitude),
      GPSLongitude: formatRationals(toDmsRationals(patch.longitude))
    };
  }

  return directories;
};

/**
 * Re-encodes `raw` as a quality 95 JPEG with the patch merged over whatever
 * EXIF the input already carries. Never throws: when decoding or encoding
 * fails the original bytes come back with an advisory message.
 */
export const rewriteImageMetadata: MetadataRewriter = async (raw, patch) => {
  try {
    const data = await sharp(raw)
      .withExifMerge(buildExifDirectories(patch))
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
    return { data };
  } catch (error) {
    return { data: raw, advisory: `EXIF write failed: ${errorMessage(error)}` };
  }
};
