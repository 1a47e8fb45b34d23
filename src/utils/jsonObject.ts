import { JsonObjectError } from './errors';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Convert any serializable value into a plain JSON object.
 * The value goes through a JSON round trip first, so class instances,
 * `toJSON` implementations and undefined members behave as they do on the wire.
 */
export function toJsonObject(value: unknown): JsonObject {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new JsonObjectError('Serialization', `Value is not serializable: ${detail}`, { cause: error });
  }

  if (encoded === undefined) {
    throw new JsonObjectError('NotAnObject', 'Value does not serialize to a JSON object');
  }

  const decoded: unknown = JSON.parse(encoded);
  if (!isJsonObject(decoded)) {
    throw new JsonObjectError('NotAnObject', 'Value does not serialize to a JSON object');
  }

  return decoded;
}
