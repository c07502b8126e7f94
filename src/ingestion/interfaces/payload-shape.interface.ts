/**
 * Decoded message body: field name -> arbitrary JSON value.
 */
export type JsonObject = Record<string, unknown>;

/**
 * A leaf field pulled out of a message, with the timestamp it belongs to.
 */
export interface ExtractedField {
  name: string;
  value: unknown;
  timestamp: Date;
}

/**
 * `{ "hoist_power": ["hoist_power", 12.5, 1718445600], ... }`
 *
 * Every field of the message shares `timestamp`, taken from the first
 * triplet in key order.
 */
export interface ArrayTripletPayload {
  shape: 'array-triplet';
  timestamp: Date;
  fields: ExtractedField[];
}

/**
 * `{ "load": "{\"value\": 820, \"timestamp\": 1718445600}" }`
 *
 * Each embedded field carries its own timestamp. Fields whose embedded
 * JSON could not be used are listed in `rejected`.
 */
export interface EmbeddedJsonPayload {
  shape: 'embedded-json';
  fields: ExtractedField[];
  rejected: string[];
}

/**
 * `{ "load": 820 }` or `{ "load": 820, "timestamp": 1718445600 }`
 */
export interface SingleScalarPayload {
  shape: 'single-scalar';
  field: ExtractedField;
}

export interface UnrecognizedPayload {
  shape: 'unrecognized';
  reason: string;
}

/**
 * Result of payload classification. Dispatch on `shape`.
 */
export type PayloadShape =
  | ArrayTripletPayload
  | EmbeddedJsonPayload
  | SingleScalarPayload
  | UnrecognizedPayload;

export type PayloadShapeName = PayloadShape['shape'];
