import development from './config.development';
import production from './config.production';
import { Config } from './types';

/**
 * Production settings only when NODE_ENV asks for them; tests and local runs use the sandbox.
 */
export const selectConfig = (nodeEnv: string | undefined): Config =>
  nodeEnv === 'production' ? production : development;

const config: Config = selectConfig(process.env.NODE_ENV);

export default config;
