import { DateTime } from 'luxon';

const CAPTURE_PARAM = 'u';

/**
 * Reads the capture time a gallery URL carries in its `u` query parameter.
 * A trailing `Z` is dropped so the value is taken as naive local time;
 * anything luxon cannot parse yields `undefined`.
 */
export const parseCapturedAt = (url: string): DateTime | undefined => {
  let raw: string | null;
  try {
    raw = new URL(url).searchParams.get(CAPTURE_PARAM);
  } catch {
    return undefined;
  }
  if (!raw) {
    return undefined;
  }
  const parsed = DateTime.fromISO(raw.trim().replace(/Z+$/, ''), { setZone: true });
  return parsed.isValid ? parsed : undefined;
};

export const toExifTimestamp = (dt: DateTime): string => dt.toFormat('yyyy:MM:dd HH:mm:ss');

export const toLogTimestamp = (dt: DateTime = DateTime.now()): string => dt.toFormat("yyyy-MM-dd'T'HH:mm:ss");
