import { BuildError, JsonObjectError } from '../utils/errors';
import { JsonObject, toJsonObject } from '../utils/jsonObject';

/** Key the notification block lives under in the top-level payload */
export const APS_KEY = 'aps';

/**
 * Either a literal string or a localization key with optional arguments.
 * Used for the title, subtitle and body of a full alert.
 */
export type LocalizableText =
  | { kind: 'normal'; text: string }
  | { kind: 'localized'; key: string; args?: string[] };

export type Title = LocalizableText;
export type Subtitle = LocalizableText;
export type Body = LocalizableText;

export type Alert =
  | { kind: 'body'; body: string }
  | {
    kind: 'full';
    title?: Title;
    subtitle?: Subtitle;
    body?: Body;
    launchImage?: string;
  };

export type Sound =
  | { kind: 'regular'; name: string }
  | {
    kind: 'critical';
    critical?: boolean;
    name?: string;
    /** 0.0 (silent) to 1.0 (full volume) */
    volume?: number;
  };

export type InterruptionLevel = 'passive' | 'active' | 'time-sensitive' | 'critical';

export const INTERRUPTION_LEVELS: readonly InterruptionLevel[] = ['passive', 'active', 'time-sensitive', 'critical'];

/**
 * The `aps` dictionary. Every field is optional; an empty notification
 * serializes to `{}`.
 */
export interface Notification {
  alert?: Alert;
  badge?: number;
  sound?: Sound;
  threadId?: string;
  category?: string;
  contentAvailable?: boolean;
  mutableContent?: boolean;
  targetContentId?: string;
  interruptionLevel?: InterruptionLevel;
  relevanceScore?: number;
  filterCriteria?: string;
  /** Live Activity fields */
  staleDate?: number;
  contentState?: JsonObject;
  timestamp?: number;
  event?: string;
  dismissalDate?: number;
  attributesType?: string;
  attributes?: JsonObject;
}

export interface Payload {
  aps: Notification;
  /** Extra top-level keys delivered next to `aps` */
  custom?: JsonObject;
}

const coerce = (value: unknown): JsonObject => {
  try {
    return toJsonObject(value);
  } catch (error) {
    if (error instanceof JsonObjectError) {
      throw new BuildError(error);
    }
    throw error;
  }
};

export const withContentState = (notification: Notification, state: unknown): Notification => ({
  ...notification,
  contentState: coerce(state),
});

export const withAttributes = (notification: Notification, attributes: unknown): Notification => ({
  ...notification,
  attributes: coerce(attributes),
});

/**
 * Attach custom top-level data. A custom `aps` key would shadow the
 * notification block and is rejected.
 */
export const withCustom = (payload: Payload, custom: unknown): Payload => {
  const object = coerce(custom);
  if (Object.prototype.hasOwnProperty.call(object, APS_KEY)) {
    throw new BuildError(new JsonObjectError('ReservedKey', `Custom data must not contain the reserved key "${APS_KEY}"`));
  }
  return { ...payload, custom: object };
};

export const alertBody = (body: string): Alert => ({ kind: 'body', body });

export const normalText = (text: string): LocalizableText => ({ kind: 'normal', text });

export const localizedText = (key: string, args?: string[]): LocalizableText =>
  args === undefined ? { kind: 'localized', key } : { kind: 'localized', key, args };
