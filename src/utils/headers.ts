import { PushOptions } from '../models/pushOptions';
import { HeaderDecodeError, HeaderError } from './errors';

export type ResponseHeaders = Record<string, string | string[] | undefined>;

// Tab, and any byte from space upward except DEL
const isHeaderChar = (code: number): boolean => code === 0x09 || (code >= 0x20 && code <= 0xff && code !== 0x7f);

// Tab, and printable ASCII
const isVisibleAscii = (code: number): boolean => code === 0x09 || (code >= 0x20 && code <= 0x7e);

const everyChar = (value: string, predicate: (code: number) => boolean): boolean => {
  for (let i = 0; i < value.length; i++) {
    if (!predicate(value.charCodeAt(i))) {
      return false;
    }
  }
  return true;
};

export const isValidHeaderValue = (value: string): boolean => everyChar(value, isHeaderChar);

const headerValue = (name: string, value: string): string => {
  if (!isValidHeaderValue(value)) {
    throw new HeaderError(name);
  }
  return value;
};

const integerHeaderValue = (name: string, value: number): string => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new HeaderError(name);
  }
  return value.toString();
};

/**
 * Build the `apns-*` request headers. Only set options are sent, except
 * `apns-topic` which is always present.
 */
export function buildPushHeaders(options: PushOptions): Record<string, string> {
  const headers: Record<string, string> = {};

  if (options.pushType !== undefined) {
    headers['apns-push-type'] = headerValue('apns-push-type', options.pushType);
  }
  if (options.id !== undefined) {
    headers['apns-id'] = headerValue('apns-id', options.id);
  }
  if (options.expiration !== undefined) {
    headers['apns-expiration'] = integerHeaderValue('apns-expiration', options.expiration);
  }
  if (options.priority !== undefined) {
    headers['apns-priority'] = integerHeaderValue('apns-priority', options.priority);
  }
  if (options.collapseId !== undefined) {
    headers['apns-collapse-id'] = headerValue('apns-collapse-id', options.collapseId);
  }
  headers['apns-topic'] = headerValue('apns-topic', options.topic);

  return headers;
}

/**
 * Read a response header as text. Repeated headers and values outside
 * visible ASCII are rejected.
 */
export function readHeader(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !everyChar(value, isVisibleAscii)) {
    throw new HeaderDecodeError(name);
  }
  return value;
}
