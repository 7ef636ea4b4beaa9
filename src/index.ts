export * from './types';
export * from './core';
export { loadConfig, getDefaultConfig, validateConfig } from './config';
export { createApp, startServer } from './api';
