/**
 * Demo application served behind the traffic logger.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { BodyReadError } from '../errors.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

export function createRouter(container: Container) {
  const health: Handler = async () =>
    json({ status: 'ok', service: container.config.serviceName });

  const echo: Handler = async (req) => {
    let body: unknown;
    try {
      body = await req.json();
    } catch (err) {
      throw new BodyReadError(err);
    }
    return json({ received: body });
  };

  const upload: Handler = async (req) => {
    let form: FormData;
    try {
      form = await req.formData();
    } catch (err) {
      throw new BodyReadError(err);
    }
    const fields: string[] = [];
    for (const [name] of form) {
      fields.push(name);
    }
    return json({ parts: fields.length, fields });
  };

  const routes: Route[] = [
    { method: 'GET', pattern: /^\/api\/health\/?$/, handler: health },
    { method: 'POST', pattern: /^\/api\/echo\/?$/, handler: echo },
    { method: 'POST', pattern: /^\/api\/upload\/?$/, handler: upload },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        return route.handler(req, ctx);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'METHOD_NOT_ALLOWED',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: { ...JSON_HEADERS, Allow: allowed },
        }
      );
    }

    return json(
      {
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      },
      404
    );
  };

  return { handle, routes };
}
