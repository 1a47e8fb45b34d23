import { generateKeyPairSync, KeyObject } from 'crypto';
import { PushTransport, TransportRequest, TransportResponse } from '../services/transport';
import { ResponseHeaders } from '../utils/headers';

export type TestKeyPair = {
  privateKeyPem: string;
  publicKey: KeyObject;
};

export const generateTestKeyPair = (namedCurve = 'prime256v1'): TestKeyPair => {
  const { privateKey, publicKey } = generateKeyPairSync('ec', { namedCurve });
  return {
    privateKeyPem: privateKey.export({ format: 'pem', type: 'pkcs8' }).toString(),
    publicKey,
  };
};

export const testResponse = (partial?: Partial<TransportResponse>): TransportResponse => ({
  status: 200,
  headers: { 'apns-id': 'E621E1F8-C36C-495A-93FC-0C247A3E6E5F' },
  body: '',
  ...partial,
});

export const errorResponse = (status: number, body: unknown, headers?: ResponseHeaders): TransportResponse => ({
  status,
  headers: headers ?? { 'apns-id': 'E621E1F8-C36C-495A-93FC-0C247A3E6E5F' },
  body: typeof body === 'string' ? body : JSON.stringify(body),
});

/**
 * In-process transport that records requests and replays queued outcomes.
 */
export class FakeTransport implements PushTransport {
  readonly requests: TransportRequest[] = [];
  closed = false;
  private readonly outcomes: Array<TransportResponse | Error> = [];

  enqueue(...outcomes: Array<TransportResponse | Error>): this {
    this.outcomes.push(...outcomes);
    return this;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const outcome = this.outcomes.shift() ?? testResponse();
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Mutable clock for signer tests.
 */
export const createTestClock = (start = 1_700_000_000_000) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    set: (ms: number) => {
      current = ms;
    },
  };
};
