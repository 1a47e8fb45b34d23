import { KeyObject } from 'crypto';
import type { Logger } from 'winston';
import { Endpoint } from '../models/endpoint';
import { Payload } from '../models/payload';
import { PushOptions, PushReceipt, ServiceErrorBody } from '../models/pushOptions';
import {
  InitializeError,
  InvalidResponseError,
  ServiceError,
  TransportError,
} from '../utils/errors';
import { buildPushHeaders, readHeader } from '../utils/headers';
import defaultLogger from '../utils/logger';
import { serializePayload } from '../utils/payloadSerializer';
import { Clock, TokenSigner } from './TokenSigner';
import { FetchTransport, PushTransport, TransportResponse } from './transport';

export interface PushClientConfig {
  teamId: string;
  keyId: string;
  privateKey: string | KeyObject;
  endpoint?: Endpoint;
}

export interface PushClientDependencies {
  transport?: PushTransport;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Validate an error body of the form `{ reason, timestamp? }`. A null timestamp counts as absent.
 */
export const parseServiceErrorBody = (value: unknown): ServiceErrorBody | null => {
  if (typeof value !== 'object' || value === null || !('reason' in value)) {
    return null;
  }
  const reason = value.reason;
  if (typeof reason !== 'string') {
    return null;
  }

  const timestamp = 'timestamp' in value ? value.timestamp : undefined;
  if (timestamp === undefined || timestamp === null) {
    return { reason };
  }
  if (typeof timestamp !== 'number' || !Number.isSafeInteger(timestamp) || timestamp < 0) {
    return null;
  }
  return { reason, timestamp };
};

/**
 * Client for the APNs provider API.
 *
 * Holds the provider token cache, so one instance belongs to one team/key
 * pair. Nothing is retried; failures reject with a `PushClientError`.
 */
export class PushClient {
  readonly endpoint: Endpoint;
  private readonly signer: TokenSigner;
  private readonly transport: PushTransport;
  private readonly logger: Logger;

  constructor(signer: TokenSigner, endpoint: Endpoint, transport: PushTransport, logger: Logger = defaultLogger) {
    this.signer = signer;
    this.endpoint = endpoint;
    this.transport = transport;
    this.logger = logger;
  }

  /**
   * Parse the key and set up the transport. Fails with `InitializeError`.
   */
  static create(config: PushClientConfig, dependencies: PushClientDependencies = {}): PushClient {
    const signer = new TokenSigner(
      { teamId: config.teamId, keyId: config.keyId, privateKey: config.privateKey },
      dependencies.clock,
    );

    let transport: PushTransport;
    if (dependencies.transport) {
      transport = dependencies.transport;
    } else {
      try {
        transport = new FetchTransport();
      } catch (error) {
        throw new InitializeError('Unable to initialize http client', { cause: error });
      }
    }

    return new PushClient(signer, config.endpoint ?? Endpoint.production(), transport, dependencies.logger);
  }

  get tokenSigner(): TokenSigner {
    return this.signer;
  }

  /**
   * Send one notification to one device.
   * @returns The receipt APNs answered with on HTTP 200
   */
  async push(payload: Payload, deviceToken: string, options: PushOptions): Promise<PushReceipt> {
    const url = `${this.endpoint.toUrl()}/3/device/${encodeURIComponent(deviceToken)}`;

    const previous = this.signer.cachedToken;
    const token = this.signer.sign();
    if (this.signer.cachedToken !== previous) {
      this.logger.debug('Signed new APNs provider token');
    }

    const headers = {
      authorization: `Bearer ${token}`,
      'content-type': 'application/json',
      ...buildPushHeaders(options),
    };
    const body = JSON.stringify(serializePayload(payload));

    let response: TransportResponse;
    try {
      response = await this.transport.send({ url, method: 'POST', headers, body });
    } catch (error) {
      throw new TransportError(error);
    }

    const receipt = this.readReceipt(response);

    if (response.status === 200) {
      this.logger.debug(`Push accepted for device ${deviceToken.substring(0, 8)}... (apns-id ${receipt.id})`);
      return receipt;
    }

    const error = this.readServiceError(response, receipt);
    this.logger.debug(`Push rejected for device ${deviceToken.substring(0, 8)}...: ${response.status} ${error.reason}`);
    throw error;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  private readReceipt(response: TransportResponse): PushReceipt {
    const id = readHeader(response.headers, 'apns-id');
    if (id === undefined) {
      throw new InvalidResponseError('APNs response is missing the apns-id header');
    }

    const uniqueId = readHeader(response.headers, 'apns-unique-id');
    return uniqueId === undefined ? { id } : { id, uniqueId };
  }

  private readServiceError(response: TransportResponse, receipt: PushReceipt): ServiceError {
    let decoded: unknown;
    try {
      decoded = JSON.parse(response.body);
    } catch (error) {
      throw new InvalidResponseError(undefined, { cause: error });
    }

    const errorBody = parseServiceErrorBody(decoded);
    if (!errorBody) {
      throw new InvalidResponseError();
    }

    return new ServiceError(response.status, errorBody.reason, receipt, errorBody.timestamp);
  }
}
