/**
 * Dependency wiring.
 * Builds the process-wide pieces once, before any request is served:
 * the compiled whitelist and the traffic logging middleware.
 */

import type { AppConfig } from './config.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import { PatternWhitelist } from './capture/PatternWhitelist.js';
import { createLoggingMiddleware } from './middleware/logging.js';

/** Logger channel the request/response records are written to. */
export const TRAFFIC_LOG_CHANNEL = 'http.request.response.log';

export interface Container {
  config: AppConfig;
  logProvider: ILogProvider;
  whitelist: PatternWhitelist;
  logging: Middleware;
}

export function createContainer(deps: {
  config: AppConfig;
  logProvider: ILogProvider;
  /** Destination of the traffic records. Default: `logProvider`. */
  recordProvider?: ILogProvider;
  clock?: () => number;
}): Container {
  const { config, logProvider } = deps;
  const whitelist = PatternWhitelist.parse(config.trafficLog.whitePatterns, logProvider);

  logProvider.debug('traffic logging initialised', {
    logResp: config.trafficLog.logResp,
    whitePatterns: whitelist.toString(),
  });

  const logging = createLoggingMiddleware({
    logProvider,
    recordProvider: deps.recordProvider,
    whitelist,
    logResponse: config.trafficLog.logResp,
    maxBodyBytes: config.trafficLog.maxBodyBytes,
    highlightCost: config.trafficLog.highlightCost,
    clock: deps.clock,
  });

  return {
    config,
    logProvider,
    whitelist,
    logging,
  };
}
