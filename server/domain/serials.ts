import { SERIAL_PREFIX } from '../../shared/constants';
import { ValidationError } from '../lib/errors';

/** Trim and add the serial prefix unless it is already there in any case. */
export function normalizeSerial(raw: string): string {
  const value = raw.trim();
  if (!value) {
    throw new ValidationError('Serial number cannot be empty');
  }
  if (value.toUpperCase().startsWith(SERIAL_PREFIX.toUpperCase())) {
    return value;
  }
  return `${SERIAL_PREFIX}${value}`;
}

export function serialKey(serial: string): string {
  return serial.toLowerCase();
}

/** Normalise a request's serials and reject repeats within it (case-insensitive). */
export function normalizeSerials(raw: string[]): string[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  const normalized = raw.map((value) => {
    const serial = normalizeSerial(value);
    const key = serialKey(serial);
    if (seen.has(key)) duplicates.push(serial);
    seen.add(key);
    return serial;
  });

  if (duplicates.length > 0) {
    throw new ValidationError(`Duplicate serial numbers in request: ${duplicates.join(', ')}`, { duplicates });
  }
  return normalized;
}
