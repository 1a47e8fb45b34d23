#!/usr/bin/env node

/**
 * Send a single alert notification from the command line.
 *
 * Usage:
 *   npm run push:send -- <deviceToken> <title> <body>
 *
 * Environment variables:
 *   APNS_TEAM_ID, APNS_KEY_ID       # Provider token identity
 *   APNS_PRIVATE_KEY_PATH=key.p8    # or APNS_PRIVATE_KEY with the PEM text
 *   APNS_TOPIC=com.example.app      # Bundle ID of the target app
 *   APNS_ENDPOINT=development       # Optional preset name or host:port
 */

import dotenv from 'dotenv';
dotenv.config();

import { normalText } from '../models/payload';
import { PushClient } from '../services/PushClient';
import { isPushClientError, ServiceError } from '../utils/errors';
import logger from '../utils/logger';
import { loadApnsSettings } from '../utils/pushClient';

async function main(): Promise<number> {
  const [deviceToken, title, body] = process.argv.slice(2);

  if (!deviceToken || !title || !body) {
    console.log(`
Usage: tsx sendPush.ts <deviceToken> <title> <body>

Environment setup required:
  APNS_TEAM_ID, APNS_KEY_ID
  APNS_PRIVATE_KEY_PATH or APNS_PRIVATE_KEY
  APNS_TOPIC
`);
    return 1;
  }

  const settings = loadApnsSettings();
  if (!settings.topic) {
    logger.error('APNS_TOPIC must be set');
    return 1;
  }

  const client = PushClient.create(settings);
  try {
    const receipt = await client.push(
      { aps: { alert: { kind: 'full', title: normalText(title), body: normalText(body) }, sound: { kind: 'regular', name: 'default' } } },
      deviceToken,
      { topic: settings.topic, pushType: 'alert', priority: 10 },
    );
    logger.info(`Push accepted by ${settings.endpoint.toString()}: apns-id ${receipt.id}${receipt.uniqueId ? `, apns-unique-id ${receipt.uniqueId}` : ''}`);
    return 0;
  } catch (error) {
    if (error instanceof ServiceError) {
      logger.error(`APNs rejected the push with ${error.status}: ${error.reason}`);
      return 1;
    }
    if (isPushClientError(error)) {
      logger.error(`${error.kind}: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await client.close();
  }
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error('Push failed:', error);
    process.exit(1);
  });
