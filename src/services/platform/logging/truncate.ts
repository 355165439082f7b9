/**
 * Payload truncation for log data.
 * Keeps runner responses and capability snapshots from bloating log output.
 */

/** Maximum string length for individual payload fields */
export const MAX_PAYLOAD_STRING_LENGTH = 500;

/** Arrays longer than this are cut, with a marker for the remainder */
const MAX_ARRAY_ITEMS = 10;

const MAX_DEPTH = 5;

export function truncateString(str: string, maxLength = MAX_PAYLOAD_STRING_LENGTH): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Deep truncate all string values in a payload.
 * Sets are logged as arrays and errors as their name and message.
 */
export function truncatePayload(
  value: unknown,
  maxStringLength = MAX_PAYLOAD_STRING_LENGTH,
  depth = 0
): unknown {
  if (depth > MAX_DEPTH) return '[max depth]';

  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    return truncateString(value, maxStringLength);
  }

  if (value instanceof Error) {
    return { name: value.name, message: truncateString(value.message, maxStringLength) };
  }

  if (value instanceof Set) {
    return truncatePayload([...value], maxStringLength, depth);
  }

  if (Array.isArray(value)) {
    const truncated = value
      .slice(0, MAX_ARRAY_ITEMS)
      .map((item) => truncatePayload(item, maxStringLength, depth + 1));
    if (value.length > MAX_ARRAY_ITEMS) {
      truncated.push(`[...${value.length - MAX_ARRAY_ITEMS} more items]`);
    }
    return truncated;
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = truncatePayload(entry, maxStringLength, depth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Truncate a record payload, keeping it a record.
 */
export function truncateRecord(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(data)) {
    result[key] = truncatePayload(entry, MAX_PAYLOAD_STRING_LENGTH, 1);
  }
  return result;
}
