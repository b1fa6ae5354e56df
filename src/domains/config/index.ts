export { loadConfig, databasePath, parseClassTtls } from './service/config-service.js';
export { AppConfigSchema, DEFAULT_CONFIG, type AppConfig } from './model/config.js';
