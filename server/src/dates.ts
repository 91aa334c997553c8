// Spreadsheet date serials count days from 1899-12-30.
const EPOCH_UTC = Date.UTC(1899, 11, 30);
const DAY_MS = 86_400_000;

// Serial 60 is the 29 Feb 1900 that spreadsheet formats keep for compatibility.
const PHANTOM_LEAP_DAY_SERIAL = 60;

function pad(n: number, width: number) {
  return String(n).padStart(width, '0');
}

export function isoDate(d: Date): string {
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1, 2)}-${pad(d.getUTCDate(), 2)}`;
}

/** Decodes a day-count serial (fractions = time of day, dropped) to yyyy-MM-dd. */
export function serialToIsoDate(serial: number): string {
  if (!Number.isFinite(serial) || serial < 0) throw new RangeError(`Bad date serial: ${serial}`);
  const days = Math.floor(serial);
  if (days === PHANTOM_LEAP_DAY_SERIAL) return '1900-02-29';
  const date = new Date(EPOCH_UTC + days * DAY_MS);
  if (Number.isNaN(date.getTime())) throw new RangeError(`Bad date serial: ${serial}`);
  return isoDate(date);
}
