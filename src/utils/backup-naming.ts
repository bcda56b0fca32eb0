/**
 * Backup table naming
 *
 * Backup tables are named {prefix}_{originalName}_{YYYYMMDD}. The last 8
 * characters are always the date; everything between "{prefix}_" and the
 * final "_" is the original table name.
 *
 * Dates are compared as strings, never parsed back into calendar dates.
 */

export const DATE_STAMP_LENGTH = 8;

export interface ParsedBackupName {
  originalName: string;
  dateStamp: string;
}

/**
 * Format a date as YYYYMMDD in local time.
 */
export function formatDateStamp(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

export function computeRetentionThreshold(now: Date, retentionDays: number): string {
  const thresholdDate = new Date(now.getTime());
  thresholdDate.setDate(thresholdDate.getDate() - retentionDays);
  if (Number.isNaN(thresholdDate.getTime())) {
    throw new RangeError(`Retention of ${retentionDays} days is outside the representable date range`);
  }
  return formatDateStamp(thresholdDate);
}

export function buildBackupTableName(prefix: string, tableName: string, dateStamp: string): string {
  return `${prefix}_${tableName}_${dateStamp}`;
}

/**
 * The trailing 8 characters, or null when the name is too short to carry a date.
 */
export function extractDateSuffix(tableName: string): string | null {
  if (tableName.length < DATE_STAMP_LENGTH) {
    return null;
  }
  return tableName.slice(-DATE_STAMP_LENGTH);
}

/**
 * True when the name's date suffix sorts strictly below the threshold.
 * The suffix is not validated as a date.
 */
export function isExpiredBackup(tableName: string, threshold: string): boolean {
  const datePart = extractDateSuffix(tableName);
  return datePart !== null && datePart < threshold;
}

/**
 * Best-effort split of a backup name. Returns null if the name does not have
 * the full {prefix}_{name}_{date} shape.
 */
export function parseBackupTableName(prefix: string, tableName: string): ParsedBackupName | null {
  const head = `${prefix}_`;
  if (!tableName.startsWith(head)) {
    return null;
  }
  const rest = tableName.slice(head.length);
  // "_" + date, plus at least one character of original name
  if (rest.length < DATE_STAMP_LENGTH + 2 || rest.charAt(rest.length - DATE_STAMP_LENGTH - 1) !== '_') {
    return null;
  }
  return {
    originalName: rest.slice(0, rest.length - DATE_STAMP_LENGTH - 1),
    dateStamp: rest.slice(-DATE_STAMP_LENGTH),
  };
}
