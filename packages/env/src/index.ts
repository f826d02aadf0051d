export {
  getExchangeEndpoints,
  getHttpTimeoutMs,
  parseEnv,
  resetEnvCache,
  type ExchangeEndpoints,
} from './config.js';
