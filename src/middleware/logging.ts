/**
 * Request/response traffic logging middleware.
 *
 * For every request it records client address, method, URL, query, headers
 * and, depending on the content type, the body (JSON) or a marker
 * (multipart). It calls the next handler exactly once and then emits one
 * record with timing and, when the response is captured, the response body.
 *
 * Response capture is enabled by `logResponse` or by a whitelist match on
 * the request path; otherwise the handler's response is returned untouched.
 * Handler errors are logged, recorded and re-thrown unchanged. A record
 * sink that throws is reported on `logProvider` and never reaches the caller.
 */

import { PatternWhitelist } from '../capture/PatternWhitelist.js';
import { RequestBodyBuffer } from '../capture/RequestBodyBuffer.js';
import { ResponseCapture } from '../capture/ResponseCapture.js';
import { RequestSnapshot, SEP } from '../capture/RequestSnapshot.js';
import type { ILogProvider, TrafficLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

export interface TrafficLoggingOptions {
  /** Diagnostics: collection failures, handler exceptions. */
  logProvider: ILogProvider;
  /** Receives one record per request. Default: `logProvider`. */
  recordProvider?: ILogProvider;
  /** Paths always logged with their response. Default: empty. */
  whitelist?: PatternWhitelist;
  /** Capture and log every response body. Default: false. */
  logResponse?: boolean;
  /** Upper bound for buffered JSON request bodies. */
  maxBodyBytes?: number;
  /** Wrap `cost: N` in bold yellow ANSI codes. Default: false. */
  highlightCost?: boolean;
  /** Millisecond clock. Default: Date.now. */
  clock?: () => number;
}

export interface RecordTiming {
  startTime: number;
  endTime: number;
}

const JSON_CONTENT_TYPE = 'application/json';
const MULTIPART_CONTENT_TYPE = 'multipart/form-data';
const HIGHLIGHT_ON = '\x1b[33m\x1b[01m';
const HIGHLIGHT_OFF = '\x1b[0m';

/** The record line: snapshot, timing, then the response body if captured. */
export function formatRecord(
  snapshot: string,
  timing: RecordTiming,
  responseText?: string,
  highlightCost = false
): string {
  const costText = `cost: ${timing.endTime - timing.startTime}`;
  const cost = highlightCost ? `${HIGHLIGHT_ON}${costText}${HIGHLIGHT_OFF}` : costText;
  let line = `${snapshot}${SEP}start time ${timing.startTime} --> end time ${timing.endTime}, ${cost}${SEP}`;
  if (responseText !== undefined) {
    line += `response info: ${responseText}${SEP}`;
  }
  return line;
}

export function createLoggingMiddleware(options: TrafficLoggingOptions): Middleware {
  const { logProvider } = options;
  const recordProvider = options.recordProvider ?? logProvider;
  const whitelist = options.whitelist ?? PatternWhitelist.EMPTY;
  const logResponse = options.logResponse ?? false;
  const clock = options.clock ?? Date.now;

  function shouldCaptureResponse(path: string): boolean {
    return logResponse || whitelist.matches(path);
  }

  function emit(
    req: Request,
    path: string,
    snapshot: string,
    timing: RecordTiming,
    status: number | undefined,
    responseText?: string
  ): void {
    const event: TrafficLogEvent = {
      level: 'info',
      message: formatRecord(snapshot, timing, responseText, options.highlightCost),
      method: req.method,
      path,
      ...(status !== undefined && { status }),
      startTime: timing.startTime,
      endTime: timing.endTime,
      durationMs: timing.endTime - timing.startTime,
      responseCaptured: responseText !== undefined,
    };
    try {
      recordProvider.log(event);
    } catch (err) {
      logProvider.error('failed to emit traffic record', {
        method: req.method,
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async function emitOnceCaptured(
    capture: ResponseCapture,
    req: Request,
    path: string,
    snapshot: string,
    timing: RecordTiming,
    status: number
  ): Promise<void> {
    let responseText: string | undefined;
    try {
      responseText = await capture.capturedText();
    } catch (err) {
      logProvider.error('failed to read captured response', {
        method: req.method,
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    emit(req, path, snapshot, timing, status, responseText);
  }

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const path = new URL(req.url).pathname;
      const captureResponse = shouldCaptureResponse(path);

      const snapshot = new RequestSnapshot(logProvider).appendBaseInfo(
        req,
        ctx.clientAddress,
        ctx.rawHeaders
      );

      let downstreamReq = req;
      const contentType = req.headers.get('content-type') ?? '';
      if (contentType.startsWith(JSON_CONTENT_TYPE)) {
        let body: RequestBodyBuffer;
        try {
          body = await RequestBodyBuffer.from(req, { maxBytes: options.maxBodyBytes });
        } catch (err) {
          logProvider.error('failed to buffer request body', {
            method: req.method,
            path,
            error: err instanceof Error ? err.message : String(err),
          });
          throw err;
        }
        snapshot.appendJsonBody(body);
        downstreamReq = body.toRequest(req);
      } else if (contentType.startsWith(MULTIPART_CONTENT_TYPE)) {
        // Leave the stream alone for the handler's multipart parser.
        snapshot.appendMultipartMarker();
      }

      const startTime = clock();
      let response: Response;
      try {
        response = await next(downstreamReq, ctx);
      } catch (err) {
        const timing = { startTime, endTime: clock() };
        logProvider.error('exception caught from downstream handler', {
          method: req.method,
          path,
          error: err instanceof Error ? err.message : String(err),
        });
        // Nothing reached the client, so a captured body is empty.
        emit(req, path, snapshot.toString(), timing, undefined, captureResponse ? '' : undefined);
        throw err;
      }
      const timing = { startTime, endTime: clock() };

      if (!captureResponse) {
        emit(req, path, snapshot.toString(), timing, response.status);
        return response;
      }

      const capture = ResponseCapture.wrap(response);
      void emitOnceCaptured(capture, req, path, snapshot.toString(), timing, response.status);
      return capture.response;
    };
  };
}
