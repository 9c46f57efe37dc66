const DIGIT_ONLY_RE = /^\d+$/;
const MONTH_KEY_RE = /^(\d{4})_(0[1-9]|1[0-2])$/;

const validDate = (date: Date): Date | null => (Number.isFinite(date.getTime()) ? date : null);

/**
 * Accepts Date objects, ISO strings and unix seconds or milliseconds
 * (as numbers or digit-only strings).
 */
export const parseTimestamp = (value?: string | number | Date | null): Date | null => {
  if (value == null) return null;

  if (value instanceof Date) {
    return validDate(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return validDate(new Date(value > 1e12 ? value : value * 1000));
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  if (DIGIT_ONLY_RE.test(trimmed)) {
    const num = Number(trimmed);
    return validDate(new Date(trimmed.length > 10 ? num : num * 1000));
  }

  return validDate(new Date(trimmed));
};

export const normalizeTimestamp = (value?: string | number | Date | null): string | null => {
  const date = parseTimestamp(value);
  return date ? date.toISOString() : null;
};

/** `YYYY_MM` in UTC, the partition key of the deletion audit log. */
export const auditMonthKey = (date: Date): string =>
  `${date.getUTCFullYear()}_${String(date.getUTCMonth() + 1).padStart(2, '0')}`;

export const isAuditMonthKey = (value: string): boolean => MONTH_KEY_RE.test(value);

export default normalizeTimestamp;
