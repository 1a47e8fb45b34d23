import fs from 'fs';
import config from '../config';
import { Endpoint } from '../models/endpoint';
import { PushClient, PushClientConfig } from '../services/PushClient';
import { InitializeError } from './errors';
import logger from './logger';

export interface ApnsSettings extends PushClientConfig {
  endpoint: Endpoint;
  /** Default apns-topic, normally the app bundle ID */
  topic?: string;
}

const readPrivateKey = (env: NodeJS.ProcessEnv): string => {
  if (env.APNS_PRIVATE_KEY) {
    // Allow the PEM to be stored on a single line with escaped newlines
    return env.APNS_PRIVATE_KEY.replace(/\\n/g, '\n');
  }

  if (env.APNS_PRIVATE_KEY_PATH) {
    try {
      return fs.readFileSync(env.APNS_PRIVATE_KEY_PATH, 'utf8');
    } catch (error) {
      throw new InitializeError(`Unable to read private key from ${env.APNS_PRIVATE_KEY_PATH}`, { cause: error });
    }
  }

  throw new InitializeError('APNS_PRIVATE_KEY or APNS_PRIVATE_KEY_PATH must be set');
};

/**
 * Read APNs credentials from the environment.
 */
export function loadApnsSettings(env: NodeJS.ProcessEnv = process.env): ApnsSettings {
  const teamId = env.APNS_TEAM_ID;
  const keyId = env.APNS_KEY_ID;

  if (!teamId || !keyId) {
    logger.error('APNS_TEAM_ID or APNS_KEY_ID not set in environment variables');
    throw new InitializeError('APNS_TEAM_ID and APNS_KEY_ID must be set in environment variables');
  }

  let endpoint = config.apns.defaultEndpoint;
  if (env.APNS_ENDPOINT) {
    const parsed = Endpoint.fromName(env.APNS_ENDPOINT);
    if (!parsed) {
      throw new InitializeError(`Invalid APNS_ENDPOINT: ${env.APNS_ENDPOINT}`);
    }
    endpoint = parsed;
  }

  return {
    teamId,
    keyId,
    privateKey: readPrivateKey(env),
    endpoint,
    topic: env.APNS_TOPIC || undefined,
  };
}

let client: PushClient | null = null;
let settings: ApnsSettings | null = null;

/**
 * Shared client for the relay. Built on first use so a missing key only
 * fails the requests that need it.
 */
export function getPushClient(): PushClient {
  if (!client) {
    settings = loadApnsSettings();
    client = PushClient.create(settings);
    logger.info(`APNs client initialized for ${settings.endpoint.toString()}`);
  }
  return client;
}

export function getDefaultTopic(): string | undefined {
  return settings?.topic ?? (process.env.APNS_TOPIC || undefined);
}

export async function closePushClient(): Promise<void> {
  if (client) {
    const closing = client;
    client = null;
    settings = null;
    await closing.close();
  }
}
