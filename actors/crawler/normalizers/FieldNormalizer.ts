import {
  InvalidNumberError,
  InvalidTimestampError,
  type NormalizationError,
} from '../core/errors';
import { err, ok, type Result } from '../core/result';
import type { FieldMap, RecordField, VideoMetadataRecord } from '../core/types';

// Plain digits, or digits grouped by thousands separators ("1,234,567")
const INTEGER_PATTERN = /^(?:\d+|\d{1,3}(?:,\d{3})+)$/;
const GROUP_SEPARATOR_PATTERN = /,/g;

// Date-time with an explicit offset: 2024-03-05T09:30:00+09:00, ...Z
const ISO_OFFSET_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-](\d{2}):?(\d{2}))$/;

const MAX_OFFSET_MINUTES = 14 * 60;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Checks the shape and every calendar and clock range */
function isValidOffsetTimestamp(text: string): boolean {
  const match = ISO_OFFSET_TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return false;
  }

  // Unmatched groups (seconds, offset of "Z") count as zero
  const [year, month, day, hour, minute, second, offsetHours, offsetMinutes] = match
    .slice(1)
    .map((part: string | undefined) => Number(part ?? 0));

  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59 &&
    offsetMinutes <= 59 &&
    offsetHours * 60 + offsetMinutes <= MAX_OFFSET_MINUTES
  );
}

export function parseViewCount(
  raw: string,
  field: RecordField = 'viewCount'
): Result<number, InvalidNumberError> {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    return err(new InvalidNumberError(field, raw));
  }

  const value = Number(text.replace(GROUP_SEPARATOR_PATTERN, ''));
  if (!Number.isSafeInteger(value)) {
    return err(new InvalidNumberError(field, raw));
  }
  return ok(value);
}

/**
 * Validates an ISO 8601 timestamp and returns it unchanged, so the offset
 * the site published survives into the record.
 */
export function parseTimestamp(
  raw: string,
  field: RecordField = 'publishedAt'
): Result<string, InvalidTimestampError> {
  const text = raw.trim();
  if (!isValidOffsetTimestamp(text)) {
    return err(new InvalidTimestampError(field, raw));
  }
  return ok(text);
}

/**
 * Coerce raw fields into a record. Like and comment counts stay display
 * strings: abbreviations such as "42만" are locale specific.
 */
export function normalizeFields(
  fields: FieldMap
): Result<VideoMetadataRecord, NormalizationError> {
  const viewCount = parseViewCount(fields.viewCount);
  if (!viewCount.ok) {
    return viewCount;
  }

  const publishedAt = parseTimestamp(fields.publishedAt);
  if (!publishedAt.ok) {
    return publishedAt;
  }

  return ok(
    Object.freeze({
      currentURL: fields.currentURL,
      thumbnailURL: fields.thumbnailURL,
      userName: fields.userName,
      likeCount: fields.likeCount,
      commentCount: fields.commentCount,
      title: fields.title,
      description: fields.description,
      publishedAt: publishedAt.value,
      viewCount: viewCount.value,
    })
  );
}
