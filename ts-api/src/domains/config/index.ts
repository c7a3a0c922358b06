export { loadConfig } from './service/config-service.js';
export { DEFAULT_CONFIG, CONFIG_ENV, type LockwardenConfig } from './model/config.js';
