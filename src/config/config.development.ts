import { Endpoint } from '../models/endpoint';
import { Config } from './types';

const config: Config = {
  env: 'development',
  service: {
    name: 'APNs Push Service',
    port: parseInt(process.env.PORT || '3000'),
  },
  apns: {
    defaultEndpoint: Endpoint.development(),
  },
};

export default config;
