export { PatternWhitelist } from './capture/PatternWhitelist.js';
export type { WhitelistPattern } from './capture/PatternWhitelist.js';
export { RequestBodyBuffer, ByteStream, TextLineReader } from './capture/RequestBodyBuffer.js';
export type { RequestBodyBufferOptions } from './capture/RequestBodyBuffer.js';
export { ResponseCapture } from './capture/ResponseCapture.js';
export { RequestSnapshot, formatQuery, formatHeaders, formEncode, MULTIPART_MARKER } from './capture/RequestSnapshot.js';
export * from './middleware/index.js';
export * from './providers/index.js';
export * from './errors.js';
export { loadConfig } from './config.js';
export type { AppConfig, Env } from './config.js';
export { createContainer, TRAFFIC_LOG_CHANNEL } from './container.js';
export type { Container } from './container.js';
export { createApp } from './server.js';
