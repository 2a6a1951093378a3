/**
 * Text description of one request, built up while the request is handled.
 * Each append step catches and logs its own failure, leaving whatever was
 * appended before it in place.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { RequestBodyBuffer } from './RequestBodyBuffer.js';

export const SEP = '\n';
export const MULTIPART_MARKER = '[multipart/form-data]';

export class RequestSnapshot {
  private readonly parts: string[] = [];

  constructor(private readonly logProvider: ILogProvider) {}

  /**
   * Client address, request line with query, then headers. With `rawHeaders`
   * the header names keep the case the client sent.
   */
  appendBaseInfo(
    req: Request,
    clientAddress: string | null,
    rawHeaders?: readonly string[]
  ): this {
    try {
      const url = new URL(req.url);
      this.parts.push(SEP, 'ip: ', clientAddress ?? 'unknown', SEP);
      this.parts.push(req.method, ' ', `${url.origin}${url.pathname}`, '?');
      this.parts.push(formatQuery(url.searchParams), SEP);
      this.parts.push(formatHeaders(req.headers, rawHeaders), SEP);
    } catch (err) {
      this.logProvider.error('error occurred when parsing basic param', errorFields(err));
    }
    return this;
  }

  /** The decoded body, line breaks removed. */
  appendJsonBody(body: RequestBodyBuffer): this {
    try {
      const lines: string[] = [];
      for (const line of body.asTextReader().lines()) {
        lines.push(line);
      }
      this.parts.push(lines.join(''), SEP);
    } catch (err) {
      this.logProvider.error('error occurred when collecting json body', errorFields(err));
    }
    return this;
  }

  appendMultipartMarker(): this {
    this.parts.push(MULTIPART_MARKER);
    return this;
  }

  toString(): string {
    return this.parts.join('');
  }
}

/**
 * `key=value` pairs joined by `&`, keys in first-seen order. A repeated key
 * renders its values as `[v1, v2]`. Values are form-url-encoded.
 */
export function formatQuery(params: URLSearchParams): string {
  const grouped = new Map<string, string[]>();
  for (const [key, value] of params) {
    const values = grouped.get(key);
    if (values) {
      values.push(value);
    } else {
      grouped.set(key, [value]);
    }
  }

  return [...grouped]
    .map(([key, values]) => {
      const value = values.length === 1 ? values[0] : `[${values.join(', ')}]`;
      return `${key}=${formEncode(value)}`;
    })
    .join('&');
}

/**
 * One `name: value` line per header, content-length excluded.
 * From `rawHeaders`: names as sent, in arrival order, first value of a
 * repeated header only, HTTP/2 pseudo-headers skipped. From `Headers`:
 * lower-cased names, repeated values combined with `, `.
 */
export function formatHeaders(headers: Headers, rawHeaders?: readonly string[]): string {
  let out = '';
  for (const [name, value] of headerEntries(headers, rawHeaders)) {
    // Stale once the body has been re-buffered.
    if (name.toLowerCase() === 'content-length') continue;
    out += `${name}: ${value}${SEP}`;
  }
  return out;
}

function headerEntries(headers: Headers, rawHeaders?: readonly string[]): Array<[string, string]> {
  if (rawHeaders === undefined) return [...headers];

  const seen = new Set<string>();
  const entries: Array<[string, string]> = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    const name = rawHeaders[i];
    const key = name.toLowerCase();
    if (name.startsWith(':') || seen.has(key)) continue;
    seen.add(key);
    entries.push([name, rawHeaders[i + 1]]);
  }
  return entries;
}

/** application/x-www-form-urlencoded: space becomes '+', only A-Z a-z 0-9 * - . _ stay literal. */
export function formEncode(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()~]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

function errorFields(err: unknown): Record<string, unknown> {
  return { error: err instanceof Error ? err.message : String(err) };
}
