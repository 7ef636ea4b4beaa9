export { createApp, createApiRouter, startServer, statusForUpstreamError } from './server';
