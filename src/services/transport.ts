import { Agent, Dispatcher, fetch } from 'undici';
import { ResponseHeaders } from '../utils/headers';

export interface TransportRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

export interface TransportResponse {
  status: number;
  /** Lower-cased header names */
  headers: ResponseHeaders;
  body: string;
}

/**
 * Carries a request to APNs. Implementations reject on connection,
 * TLS or timeout failures and resolve with whatever response arrived.
 */
export interface PushTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export interface FetchTransportOptions {
  /** Milliseconds to wait for response headers */
  headersTimeout?: number;
  /** Milliseconds to wait between body chunks */
  bodyTimeout?: number;
  /** Replaces the HTTP/2 agent; the timeouts are then ignored */
  dispatcher?: Dispatcher;
}

/**
 * HTTP/2 transport built on undici's fetch. APNs does not accept HTTP/1.1.
 */
export class FetchTransport implements PushTransport {
  private readonly dispatcher: Dispatcher;

  constructor(options: FetchTransportOptions = {}) {
    this.dispatcher = options.dispatcher ?? new Agent({
      allowH2: true,
      headersTimeout: options.headersTimeout,
      bodyTimeout: options.bodyTimeout,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      dispatcher: this.dispatcher,
    });

    const headers: ResponseHeaders = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers,
      body: await response.text(),
    };
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
