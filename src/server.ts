import type { Container } from './container.js';
import { createRouter } from './api/router.js';
import { errorHandler } from './middleware/error-handler.js';
import { pipeline } from './middleware/pipeline.js';
import type { Handler } from './middleware/pipeline.js';

/**
 * The full request path: errors are mapped outermost, so the traffic
 * logger sees (and re-throws) handler failures before they become responses.
 */
export function createApp(container: Container): Handler {
  const router = createRouter(container);
  return pipeline(errorHandler, container.logging)(router.handle);
}
