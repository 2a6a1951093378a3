/**
 * Composable middleware pipeline over web-standard Request/Response handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Remote address of the client socket, when the transport knows it. */
  clientAddress: string | null;
  /**
   * Header names and values as received, flattened `[name, value, ...]`
   * (Node's `rawHeaders`). Absent when the transport only exposes `Headers`.
   */
  rawHeaders?: readonly string[];
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(errorHandler, logging)(handler)
 *   → errorHandler wraps (logging wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
