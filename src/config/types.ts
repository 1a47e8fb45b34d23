import { Endpoint } from '../models/endpoint';

export type Environment = 'production' | 'development';

export type Config = {
  env: Environment;
  service: {
    name: string;
    port: number;
  };
  apns: {
    /** Used unless APNS_ENDPOINT overrides it */
    defaultEndpoint: Endpoint;
    /** Priority sent when a request does not choose one */
    defaultPriority?: number;
  };
}
