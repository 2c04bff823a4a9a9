import { DateTime, FixedOffsetZone, type Zone } from 'luxon';

// XMLTV style: 20240917101500 +0200, 20240917101500+0200, 202409171015 or no offset at all
const XMLTV_TIME = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})?(?:\s*([+-])(\d{2}):?(\d{2}))?$/;

/**
 * Converts an XMLTV timestamp to UTC epoch milliseconds.
 * Returns null when the value cannot be read as a real calendar instant.
 */
export function xmltvToMs(raw: string, fallbackTimeZone = 'UTC'): number | null {
  const m = raw.trim().match(XMLTV_TIME);
  if (!m) return null;
  const [, Y, M, D, h, mnt, s, sign, tzh, tzm] = m;
  let zone: Zone | string = fallbackTimeZone;
  if (sign) {
    const minutes = parseInt(tzh, 10) * 60 + parseInt(tzm, 10);
    zone = FixedOffsetZone.instance(sign === '-' ? -minutes : minutes);
  }
  const dt = DateTime.fromObject(
    {
      year: parseInt(Y, 10),
      month: parseInt(M, 10),
      day: parseInt(D, 10),
      hour: parseInt(h, 10),
      minute: parseInt(mnt, 10),
      second: s ? parseInt(s, 10) : 0,
    },
    { zone },
  );
  return dt.isValid ? dt.toMillis() : null;
}
