export const PRODUCTION_HOST = 'api.push.apple.com';
export const DEVELOPMENT_HOST = 'api.sandbox.push.apple.com';
export const DEFAULT_PORT = 443;
export const ALTERNATE_PORT = 2197;

/**
 * APNs provider endpoint. The string form is `host:port`.
 */
export class Endpoint {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number) {
    this.host = host;
    this.port = port;
  }

  static production(): Endpoint {
    return new Endpoint(PRODUCTION_HOST, DEFAULT_PORT);
  }

  static productionAlternate(): Endpoint {
    return new Endpoint(PRODUCTION_HOST, ALTERNATE_PORT);
  }

  static development(): Endpoint {
    return new Endpoint(DEVELOPMENT_HOST, DEFAULT_PORT);
  }

  static developmentAlternate(): Endpoint {
    return new Endpoint(DEVELOPMENT_HOST, ALTERNATE_PORT);
  }

  /**
   * Parse `host:port`. Returns null unless there is exactly one colon,
   * a non-empty host and a port in 1..65535.
   */
  static parse(value: string): Endpoint | null {
    const parts = value.split(':');
    if (parts.length !== 2) {
      return null;
    }

    const [host, portText] = parts;
    if (!host || !/^\d+$/.test(portText)) {
      return null;
    }

    const port = parseInt(portText, 10);
    if (port < 1 || port > 65535) {
      return null;
    }

    return new Endpoint(host, port);
  }

  /**
   * Resolve a preset name, falling back to `host:port`.
   */
  static fromName(value: string): Endpoint | null {
    switch (value.trim().toLowerCase()) {
      case 'production': return Endpoint.production();
      case 'production-alternate': return Endpoint.productionAlternate();
      case 'development':
      case 'sandbox': return Endpoint.development();
      case 'development-alternate': return Endpoint.developmentAlternate();
      default: return Endpoint.parse(value.trim());
    }
  }

  toString(): string {
    return `${this.host}:${this.port}`;
  }

  toUrl(): string {
    return `https://${this.host}:${this.port}`;
  }
}
