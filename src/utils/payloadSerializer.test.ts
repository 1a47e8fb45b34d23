import { localizedText, normalText, Notification, Payload, withAttributes, withCustom } from '../models/payload';
import { encodeFlag, serializeAlert, serializeNotification, serializePayload, serializeSound } from './payloadSerializer';

describe('payloadSerializer', () => {
  describe('serializeNotification', () => {
    it('should serialize an empty notification to an empty object', () => {
      expect(JSON.stringify(serializeNotification({}))).toBe('{}');
    });

    it('should serialize a filled notification with flattened alert fields and integer flags', () => {
      const aps = withAttributes({
        alert: {
          kind: 'full',
          title: normalText('Title'),
          subtitle: localizedText('SUBTITLE_KEY'),
        },
        sound: { kind: 'critical', critical: true },
        mutableContent: true,
        interruptionLevel: 'time-sensitive',
      }, { attr: 'foo' });

      expect(JSON.stringify(serializeNotification(aps))).toBe(
        '{"alert":{"title":"Title","subtitle-loc-key":"SUBTITLE_KEY"},"sound":{"critical":1},"mutable-content":1,"interruption-level":"time-sensitive","attributes":{"attr":"foo"}}'
      );
    });

    it('should omit flags that are false', () => {
      const aps: Notification = {
        contentAvailable: false,
        mutableContent: false,
        sound: { kind: 'critical', critical: false, name: 'alarm.caf' },
      };

      expect(serializeNotification(aps)).toEqual({ sound: { name: 'alarm.caf' } });
    });

    it('should emit every field under its kebab-case name in declaration order', () => {
      const aps: Notification = {
        alert: { kind: 'body', body: 'Hello' },
        badge: 3,
        sound: { kind: 'regular', name: 'default' },
        threadId: 'thread-1',
        category: 'MESSAGE',
        contentAvailable: true,
        mutableContent: true,
        targetContentId: 'window-1',
        interruptionLevel: 'passive',
        relevanceScore: 0.5,
        filterCriteria: 'work',
        staleDate: 1700000100,
        contentState: { score: 2 },
        timestamp: 1700000000,
        event: 'update',
        dismissalDate: 1700000200,
        attributesType: 'MatchAttributes',
        attributes: { team: 'home' },
      };

      const serialized = serializeNotification(aps);

      expect(Object.keys(serialized)).toEqual([
        'alert',
        'badge',
        'sound',
        'thread-id',
        'category',
        'content-available',
        'mutable-content',
        'target-content-id',
        'interruption-level',
        'relevance-score',
        'filter-criteria',
        'stale-date',
        'content-state',
        'timestamp',
        'event',
        'dismissal-date',
        'attributes-type',
        'attributes',
      ]);
      expect(serialized['content-available']).toBe(1);
      expect(serialized['mutable-content']).toBe(1);
      expect(serialized['alert']).toBe('Hello');
      expect(serialized['sound']).toBe('default');
    });

    it('should never emit a boolean value', () => {
      const aps: Notification = {
        contentAvailable: true,
        mutableContent: false,
        sound: { kind: 'critical', critical: true, volume: 0.8 },
      };

      const json = JSON.stringify(serializeNotification(aps));

      expect(json).toBe('{"sound":{"critical":1,"volume":0.8},"content-available":1}');
    });
  });

  describe('serializeAlert', () => {
    it('should serialize a body alert as a bare string', () => {
      expect(serializeAlert({ kind: 'body', body: 'Plain text' })).toBe('Plain text');
    });

    it('should flatten localized fields with their arguments', () => {
      const alert = serializeAlert({
        kind: 'full',
        title: localizedText('TITLE_KEY', ['Alice']),
        subtitle: normalText('Subtitle'),
        body: localizedText('BODY_KEY', ['3', 'messages']),
        launchImage: 'launch.png',
      });

      expect(JSON.stringify(alert)).toBe(
        '{"title-loc-key":"TITLE_KEY","title-loc-args":["Alice"],"subtitle":"Subtitle","loc-key":"BODY_KEY","loc-args":["3","messages"],"launch-image":"launch.png"}'
      );
    });

    it('should leave out loc-args when no arguments are given', () => {
      expect(serializeAlert({ kind: 'full', body: localizedText('BODY_KEY') })).toEqual({ 'loc-key': 'BODY_KEY' });
    });

    it('should serialize a full alert without fields to an empty object', () => {
      expect(serializeAlert({ kind: 'full' })).toEqual({});
    });
  });

  describe('serializeSound', () => {
    it('should serialize a regular sound as a bare string', () => {
      expect(serializeSound({ kind: 'regular', name: 'chime.aiff' })).toBe('chime.aiff');
    });

    it('should serialize a critical sound with name and volume', () => {
      expect(JSON.stringify(serializeSound({ kind: 'critical', critical: true, name: 'default', volume: 1 })))
        .toBe('{"critical":1,"name":"default","volume":1}');
    });
  });

  describe('encodeFlag', () => {
    it('should map true to 1 and everything else to undefined', () => {
      expect(encodeFlag(true)).toBe(1);
      expect(encodeFlag(false)).toBeUndefined();
      expect(encodeFlag(undefined)).toBeUndefined();
    });
  });

  describe('serializePayload', () => {
    it('should place custom fields next to aps', () => {
      const payload = withCustom({ aps: {} }, { payload: 'payload' });

      expect(JSON.stringify(serializePayload(payload))).toBe('{"aps":{},"payload":"payload"}');
    });

    it('should serialize a payload without custom data', () => {
      const payload: Payload = { aps: { badge: 0 } };

      expect(JSON.stringify(serializePayload(payload))).toBe('{"aps":{"badge":0}}');
    });

    it('should keep the notification block when hand-built custom data contains aps', () => {
      const payload: Payload = { aps: { badge: 1 }, custom: { aps: { badge: 99 }, extra: true } };

      expect(serializePayload(payload)).toEqual({ aps: { badge: 1 }, extra: true });
    });

    it('should keep a custom __proto__ key as a plain field', () => {
      const payload = withCustom({ aps: {} }, JSON.parse('{"__proto__":{"x":1},"y":2}'));

      const body = serializePayload(payload);

      expect(JSON.stringify(body)).toBe('{"aps":{},"__proto__":{"x":1},"y":2}');
      expect(Object.getPrototypeOf(body)).toBe(Object.prototype);
    });
  });
});
