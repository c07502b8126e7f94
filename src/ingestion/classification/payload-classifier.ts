import {
  ExtractedField,
  JsonObject,
  PayloadShape,
} from '../interfaces/payload-shape.interface';

/**
 * Device/session fields some gateways add next to the measurement.
 * They never count as the measurement of a single-scalar message.
 */
export const RESERVED_CONTROL_FIELDS: readonly string[] = [
  'device_token',
  'devicetoken',
  'access_token',
  'token',
  'client_id',
  'clientid',
];

const TIMESTAMP_FIELD = 'timestamp';

/**
 * Classify a decoded message body.
 *
 * Shapes are tested in a fixed order and the first match wins:
 * 1. array-triplet - some field holds `[name, value, unixSeconds, ...]`
 * 2. embedded-json - some field holds a JSON object string with a timestamp
 * 3. single-scalar - exactly one non-control field with a scalar value
 *
 * A body matching several shapes resolves to the earliest one, e.g. a
 * message mixing triplets and embedded JSON strings is an array-triplet
 * and its embedded strings are ignored.
 *
 * @param body - Decoded JSON object
 * @param receivedAt - Receipt time, used when the body has no usable timestamp
 */
export function classifyPayload(
  body: JsonObject,
  receivedAt: Date,
): PayloadShape {
  const entries = Object.entries(body);

  if (entries.some(([, value]) => isTriplet(value))) {
    return classifyArrayTriplet(entries, receivedAt);
  }

  if (entries.some(([, value]) => isEmbeddedJson(value))) {
    return classifyEmbeddedJson(entries);
  }

  const measurementEntries = entries.filter(
    ([name]) => !isControlField(name) && !isTimestampField(name),
  );
  if (measurementEntries.length === 1) {
    const [name, value] = measurementEntries[0];
    if (isScalar(value)) {
      return {
        shape: 'single-scalar',
        field: {
          name,
          value,
          timestamp: parseTimestamp(body[TIMESTAMP_FIELD]) ?? receivedAt,
        },
      };
    }
    return {
      shape: 'unrecognized',
      reason: `single field '${name}' does not hold a scalar value`,
    };
  }

  return {
    shape: 'unrecognized',
    reason:
      measurementEntries.length === 0
        ? 'no measurement fields'
        : `${measurementEntries.length} fields without triplet or embedded JSON values`,
  };
}

function classifyArrayTriplet(
  entries: Array<[string, unknown]>,
  receivedAt: Date,
): PayloadShape {
  const firstTriplet = entries.map(([, value]) => value).find(isTriplet);
  const timestamp =
    (firstTriplet ? parseUnixSeconds(firstTriplet[2]) : null) ?? receivedAt;

  const fields: ExtractedField[] = [];
  for (const [name, value] of entries) {
    // [name, value] pairs still carry a value even without a timestamp
    if (Array.isArray(value) && value.length >= 2) {
      fields.push({ name, value: value[1], timestamp });
    }
  }

  return { shape: 'array-triplet', timestamp, fields };
}

function classifyEmbeddedJson(entries: Array<[string, unknown]>): PayloadShape {
  const fields: ExtractedField[] = [];
  const rejected: string[] = [];

  for (const [name, value] of entries) {
    if (!isEmbeddedJson(value)) {
      continue;
    }
    const field = parseEmbeddedField(name, value);
    if (field) {
      fields.push(field);
    } else {
      rejected.push(name);
    }
  }

  return { shape: 'embedded-json', fields, rejected };
}

/**
 * Parse `{"value": 12.5, "timestamp": 1718445600}`.
 * The value may also be keyed by the field's own name.
 */
function parseEmbeddedField(name: string, raw: string): ExtractedField | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isJsonObject(parsed)) {
    return null;
  }

  const value = parsed.value !== undefined ? parsed.value : parsed[name];
  const timestamp = parseTimestamp(parsed[TIMESTAMP_FIELD]);
  if (value === undefined || value === null || timestamp === null) {
    return null;
  }
  return { name, value, timestamp };
}

function isTriplet(value: unknown): value is unknown[] {
  return Array.isArray(value) && value.length >= 3;
}

function isEmbeddedJson(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    value.startsWith('{') &&
    value.includes(TIMESTAMP_FIELD)
  );
}

function isScalar(value: unknown): value is number | boolean | string {
  return (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'string'
  );
}

function isControlField(name: string): boolean {
  return RESERVED_CONTROL_FIELDS.includes(name.toLowerCase());
}

function isTimestampField(name: string): boolean {
  return name.toLowerCase() === TIMESTAMP_FIELD;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Unix seconds (fractional allowed) to Date; null when not a finite number.
 */
export function parseUnixSeconds(value: unknown): Date | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return null;
  }
  const date = new Date(value * 1000);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Accepts unix seconds as a number or numeric string, or an ISO-8601 string.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value === 'number') {
    return parseUnixSeconds(value);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const numeric = Number(value);
  if (Number.isFinite(numeric)) {
    return parseUnixSeconds(numeric);
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
