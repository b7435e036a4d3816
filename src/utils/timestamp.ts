import { differenceInDays, format, isValid, parse, startOfSecond } from 'date-fns';

// Store boundary format, naive local time
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const ACCEPTED_FORMATS = [TIMESTAMP_FORMAT, "yyyy-MM-dd'T'HH:mm:ss", 'yyyy-MM-dd HH:mm', 'yyyy-MM-dd'];

export const formatTimestamp = (date: Date): string => format(date, TIMESTAMP_FORMAT);

/**
 * Parse a stored timestamp as local time. Returns null when no accepted
 * format matches.
 */
export const parseTimestamp = (value: string): Date | null => {
  const trimmed = value.trim();
  for (const pattern of ACCEPTED_FORMATS) {
    const parsed = parse(trimmed, pattern, new Date(0));
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
};

// Timestamps are stored at second precision
export const truncateToSecond = (date: Date): Date => startOfSecond(date);

/**
 * Whole days elapsed from `earlier` to `later`, truncated.
 */
export const elapsedWholeDays = (later: Date, earlier: Date): number => differenceInDays(later, earlier);
