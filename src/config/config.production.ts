import { Endpoint } from '../models/endpoint';
import { Config } from './types';

const config: Config = {
  env: 'production',
  service: {
    name: 'APNs Push Service',
    port: parseInt(process.env.PORT || '3000'),
  },
  apns: {
    defaultEndpoint: Endpoint.production(),
    defaultPriority: 10,
  },
};

export default config;
