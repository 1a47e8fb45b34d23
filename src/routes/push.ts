import express, { NextFunction, Request, Response } from 'express';
import config from '../config';
import { Alert, INTERRUPTION_LEVELS, InterruptionLevel, normalText, Notification, Payload, withCustom } from '../models/payload';
import { isPushType, PushOptions, PushType } from '../models/pushOptions';
import { BuildError, HeaderError, isPushClientError, ServiceError } from '../utils/errors';
import { buildPushHeaders } from '../utils/headers';
import logger from '../utils/logger';
import { getDefaultTopic, getPushClient } from '../utils/pushClient';
import { createRateLimit } from '../utils/rateLimit';
import { PushRequest, PushResult } from './types';

const router = express.Router();

/** Reasons after which the cached provider token must not be reused */
const TOKEN_REJECTED_REASONS = ['ExpiredProviderToken', 'InvalidProviderToken'];

const pushRateLimit = createRateLimit(
  60 * 1000, // 1 minute
  120, // limit each IP to 120 push requests per windowMs
  'Too many push requests from this IP, please try again later.'
);

const isOptionalString = (value: unknown): value is string | undefined =>
  value === undefined || typeof value === 'string';

const isOptionalBoolean = (value: unknown): value is boolean | undefined =>
  value === undefined || typeof value === 'boolean';

const isOptionalInteger = (value: unknown): value is number | undefined =>
  value === undefined || (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0);

const isInterruptionLevel = (value: unknown): value is InterruptionLevel =>
  INTERRUPTION_LEVELS.some(level => level === value);

/**
 * Check the request body, returning an error message for the first invalid field.
 */
export const validatePushRequest = (body: PushRequest): string | null => {
  const { deviceTokens } = body;
  if (!Array.isArray(deviceTokens) || deviceTokens.length === 0) {
    return 'deviceTokens must be a non-empty array';
  }
  if (!deviceTokens.every(token => typeof token === 'string' && token.length > 0)) {
    return 'deviceTokens must only contain non-empty strings';
  }

  for (const field of ['title', 'subtitle', 'body', 'sound', 'threadId', 'category', 'collapseId', 'topic'] as const) {
    if (!isOptionalString(body[field])) {
      return `${field} must be a string`;
    }
  }
  for (const field of ['mutableContent', 'contentAvailable'] as const) {
    if (!isOptionalBoolean(body[field])) {
      return `${field} must be a boolean`;
    }
  }
  for (const field of ['badge', 'priority', 'expiration'] as const) {
    if (!isOptionalInteger(body[field])) {
      return `${field} must be a non-negative integer`;
    }
  }
  if (body.interruptionLevel !== undefined && !isInterruptionLevel(body.interruptionLevel)) {
    return `interruptionLevel must be one of ${INTERRUPTION_LEVELS.join(', ')}`;
  }
  if (body.pushType !== undefined && !isPushType(body.pushType)) {
    return 'pushType is not a valid APNs push type';
  }

  return null;
};

const toAlert = (body: PushRequest): Alert | undefined => {
  if (body.title !== undefined || body.subtitle !== undefined) {
    return {
      kind: 'full',
      title: body.title !== undefined ? normalText(body.title) : undefined,
      subtitle: body.subtitle !== undefined ? normalText(body.subtitle) : undefined,
      body: body.body !== undefined ? normalText(body.body) : undefined,
    };
  }
  if (body.body !== undefined) {
    return { kind: 'body', body: body.body };
  }
  return undefined;
};

/**
 * Map a validated request onto the payload model.
 */
export const toPayload = (body: PushRequest): Payload => {
  const aps: Notification = {
    alert: toAlert(body),
    badge: body.badge,
    sound: body.sound !== undefined ? { kind: 'regular', name: body.sound } : undefined,
    threadId: body.threadId,
    category: body.category,
    mutableContent: body.mutableContent,
    contentAvailable: body.contentAvailable,
    interruptionLevel: isInterruptionLevel(body.interruptionLevel) ? body.interruptionLevel : undefined,
  };

  const payload: Payload = { aps };
  return body.data === undefined ? payload : withCustom(payload, body.data);
};

const toPushOptions = (body: PushRequest, topic: string): PushOptions => {
  const pushType: PushType = isPushType(body.pushType) ? body.pushType : (toAlert(body) ? 'alert' : 'background');
  return {
    pushType,
    // Background pushes are rejected unless sent with low priority
    priority: body.priority ?? (pushType === 'background' ? 5 : config.apns.defaultPriority),
    expiration: body.expiration,
    collapseId: body.collapseId,
    topic,
  };
};

/**
 * POST /push/send
 * Send one notification to every listed device. Devices are pushed one at a
 * time through the shared client; per-device failures are reported, not thrown.
 */
router.post('/send', pushRateLimit, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  const body: PushRequest = req.body;
  const validationError = validatePushRequest(body);
  if (validationError) {
    res.status(400).json({ error: validationError });
    return;
  }

  const topic = body.topic ?? getDefaultTopic();
  if (!topic) {
    res.status(400).json({ error: 'topic is required when APNS_TOPIC is not configured' });
    return;
  }

  let payload: Payload;
  let options: PushOptions;
  try {
    payload = toPayload(body);
    options = toPushOptions(body, topic);
    buildPushHeaders(options);
  } catch (error) {
    if (error instanceof BuildError || error instanceof HeaderError) {
      res.status(400).json({ error: error.message });
      return;
    }
    next(error);
    return;
  }

  const result: PushResult = {
    success: [],
    failed: [],
    summary: { totalTargeted: body.deviceTokens.length, successful: 0, failed: 0 },
  };

  try {
    const client = getPushClient();

    for (const deviceToken of body.deviceTokens) {
      try {
        const receipt = await client.push(payload, deviceToken, options);
        result.success.push({ deviceToken, ...receipt });
      } catch (error) {
        if (error instanceof ServiceError) {
          if (TOKEN_REJECTED_REASONS.includes(error.reason)) {
            client.tokenSigner.invalidate();
          }
          result.failed.push({ deviceToken, reason: error.reason, status: error.status });
        } else if (isPushClientError(error)) {
          result.failed.push({ deviceToken, reason: error.message });
        } else {
          throw error;
        }
      }
    }
  } catch (error) {
    next(error);
    return;
  }

  result.summary.successful = result.success.length;
  result.summary.failed = result.failed.length;
  logger.info(`Push request completed: ${result.summary.successful} sent, ${result.summary.failed} failed`);

  res.status(200).json(result);
});

export default router;
