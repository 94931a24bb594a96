export { getIndexerConfig, getNodeEnv, isTest, parseEnv, toIndexerConfig, type IndexerConfig } from './config.js';
