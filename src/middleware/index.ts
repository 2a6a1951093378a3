export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler } from './error-handler.js';
export type { ApiErrorResponse } from './error-handler.js';
export { createLoggingMiddleware, formatRecord } from './logging.js';
export type { TrafficLoggingOptions, RecordTiming } from './logging.js';
