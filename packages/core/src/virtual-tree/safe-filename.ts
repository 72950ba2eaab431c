import { SAFE_FILENAME_MAX_LENGTH } from '../planner/constants';

const DISALLOWED = /[^A-Za-z0-9._ -]+/g;

/**
 * One path segment made of `A-Za-z0-9._ -` only, whitespace collapsed.
 * Never empty and never `.` or `..`.
 */
export function safeFilename(name: string, maxLength: number = SAFE_FILENAME_MAX_LENGTH): string {
  let safe = name.trim().replace(/\0/g, '').replace(DISALLOWED, '_').replace(/\s+/g, ' ').trim();

  if (!safe || /^\.+$/.test(safe)) {
    safe = 'untitled';
  }
  if (safe.length > maxLength) {
    safe = safe.slice(0, maxLength).trimEnd();
  }
  return safe;
}
