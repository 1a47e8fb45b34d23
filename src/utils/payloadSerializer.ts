import { Alert, APS_KEY, LocalizableText, Notification, Payload, Sound } from '../models/payload';
import { JsonObject, JsonValue } from './jsonObject';

/**
 * Wire names of the two shapes a localizable field can take.
 */
interface LocalizableFieldNames {
  normal: string;
  key: string;
  args: string;
}

const TITLE_FIELDS: LocalizableFieldNames = { normal: 'title', key: 'title-loc-key', args: 'title-loc-args' };
const SUBTITLE_FIELDS: LocalizableFieldNames = { normal: 'subtitle', key: 'subtitle-loc-key', args: 'subtitle-loc-args' };
const BODY_FIELDS: LocalizableFieldNames = { normal: 'body', key: 'loc-key', args: 'loc-args' };

/**
 * APNs treats these flags as set when present, so `true` is sent as 1
 * and `false` is indistinguishable from unset.
 */
export const encodeFlag = (value: boolean | undefined): 1 | undefined => (value === true ? 1 : undefined);

const put = (target: JsonObject, key: string, value: JsonValue | undefined): void => {
  if (value !== undefined) {
    target[key] = value;
  }
};

const flattenLocalizable = (target: JsonObject, text: LocalizableText | undefined, names: LocalizableFieldNames): void => {
  if (!text) return;

  switch (text.kind) {
    case 'normal':
      target[names.normal] = text.text;
      break;
    case 'localized':
      target[names.key] = text.key;
      put(target, names.args, text.args);
      break;
  }
};

export const serializeAlert = (alert: Alert): JsonValue => {
  if (alert.kind === 'body') {
    return alert.body;
  }

  const object: JsonObject = {};
  flattenLocalizable(object, alert.title, TITLE_FIELDS);
  flattenLocalizable(object, alert.subtitle, SUBTITLE_FIELDS);
  flattenLocalizable(object, alert.body, BODY_FIELDS);
  put(object, 'launch-image', alert.launchImage);
  return object;
};

export const serializeSound = (sound: Sound): JsonValue => {
  if (sound.kind === 'regular') {
    return sound.name;
  }

  const object: JsonObject = {};
  put(object, 'critical', encodeFlag(sound.critical));
  put(object, 'name', sound.name);
  put(object, 'volume', sound.volume);
  return object;
};

/**
 * Encode the `aps` dictionary. Unset fields are never emitted.
 */
export function serializeNotification(notification: Notification): JsonObject {
  const aps: JsonObject = {};

  put(aps, 'alert', notification.alert && serializeAlert(notification.alert));
  put(aps, 'badge', notification.badge);
  put(aps, 'sound', notification.sound && serializeSound(notification.sound));
  put(aps, 'thread-id', notification.threadId);
  put(aps, 'category', notification.category);
  put(aps, 'content-available', encodeFlag(notification.contentAvailable));
  put(aps, 'mutable-content', encodeFlag(notification.mutableContent));
  put(aps, 'target-content-id', notification.targetContentId);
  put(aps, 'interruption-level', notification.interruptionLevel);
  put(aps, 'relevance-score', notification.relevanceScore);
  put(aps, 'filter-criteria', notification.filterCriteria);
  put(aps, 'stale-date', notification.staleDate);
  put(aps, 'content-state', notification.contentState);
  put(aps, 'timestamp', notification.timestamp);
  put(aps, 'event', notification.event);
  put(aps, 'dismissal-date', notification.dismissalDate);
  put(aps, 'attributes-type', notification.attributesType);
  put(aps, 'attributes', notification.attributes);

  return aps;
}

/**
 * Encode the full request body: the notification block under `aps`
 * followed by the custom keys. A custom `aps` key is dropped; the
 * notification block always wins.
 */
export function serializePayload(payload: Payload): JsonObject {
  const custom = Object.entries(payload.custom ?? {}).filter(([key]) => key !== APS_KEY);
  // fromEntries defines own properties, so a custom `__proto__` stays a field
  const entries: Array<[string, JsonValue]> = [[APS_KEY, serializeNotification(payload.aps)], ...custom];

  return Object.fromEntries(entries);
}
