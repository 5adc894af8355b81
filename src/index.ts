export * from './schema/index.js';
export * from './bid/bid.model.js';
export { config } from './config/index.js';
export { logger, createModuleLogger } from './utils/logger.js';
