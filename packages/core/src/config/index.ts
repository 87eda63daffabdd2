export { mergeConfig, resolveConfig } from './resolve-config.js';
