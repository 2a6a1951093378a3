/**
 * Request body held in memory so it can be read any number of times.
 *
 * The body is drained once, when the buffer is created. Every reader
 * (`asByteStream`, `asTextReader`, `asReadableStream`, `toRequest`) gets its
 * own cursor over the same bytes, so readers never interfere with each
 * other and never exhaust the source.
 */

import { BodyReadError, PayloadTooLargeError } from '../errors.js';

const END_OF_STREAM = -1;
const LINE_BREAK = /\r\n|\n|\r/;
const DEFAULT_CHUNK_SIZE = 8192;

export interface RequestBodyBufferOptions {
  /** Reject bodies longer than this many bytes. Unbounded when omitted. */
  maxBytes?: number;
}

export class RequestBodyBuffer {
  private constructor(private readonly body: Uint8Array) {}

  /**
   * Drain `req.body` to completion. Rejects with BodyReadError when the body
   * cannot be read, or PayloadTooLargeError when it exceeds `maxBytes`.
   */
  static async from(req: Request, options: RequestBodyBufferOptions = {}): Promise<RequestBodyBuffer> {
    if (req.body === null) {
      return new RequestBodyBuffer(new Uint8Array(0));
    }
    if (req.bodyUsed) {
      throw new BodyReadError(new Error('Request body has already been consumed'));
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    let tooLarge = false;

    try {
      const reader = req.body.getReader();
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          total += value.byteLength;
          if (options.maxBytes !== undefined && total > options.maxBytes) {
            tooLarge = true;
            await reader.cancel();
            break;
          }
          chunks.push(value);
        }
      } finally {
        reader.releaseLock();
      }
    } catch (err) {
      throw new BodyReadError(err);
    }

    if (tooLarge && options.maxBytes !== undefined) {
      throw new PayloadTooLargeError(options.maxBytes);
    }

    return new RequestBodyBuffer(concat(chunks, total));
  }

  static of(bytes: Uint8Array | string): RequestBodyBuffer {
    return new RequestBodyBuffer(
      typeof bytes === 'string' ? new TextEncoder().encode(bytes) : bytes.slice()
    );
  }

  get size(): number {
    return this.body.byteLength;
  }

  /** A copy of the buffered bytes. */
  toBytes(): Uint8Array {
    return this.body.slice();
  }

  asByteStream(): ByteStream {
    return new ByteStream(this.body);
  }

  asTextReader(): TextLineReader {
    return new TextLineReader(this.asByteStream());
  }

  asReadableStream(): ReadableStream<Uint8Array> {
    const bytes = this.body;
    return new ReadableStream<Uint8Array>({
      start(controller) {
        if (bytes.byteLength > 0) controller.enqueue(bytes.slice());
        controller.close();
      },
    });
  }

  text(): string {
    return new TextDecoder('utf-8').decode(this.body);
  }

  /**
   * A request equivalent to `original`, with its body served from this
   * buffer. Each call returns a new Request with an unread body.
   */
  toRequest(original: Request): Request {
    return new Request(original.url, {
      method: original.method,
      headers: original.headers,
      // A request that arrived without a body stays without one.
      body: original.body === null ? null : this.body.slice(),
      signal: original.signal,
      redirect: original.redirect,
    });
  }
}

/** Forward-only cursor over an immutable byte sequence. */
export class ByteStream {
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get available(): number {
    return this.bytes.byteLength - this.position;
  }

  get isFinished(): boolean {
    return this.available === 0;
  }

  /** Next byte (0-255), or -1 at end of stream. */
  read(): number;
  /** Up to `length` bytes; empty at end of stream. */
  read(length: number): Uint8Array;
  read(length?: number): number | Uint8Array {
    if (length === undefined) {
      if (this.isFinished) return END_OF_STREAM;
      return this.bytes[this.position++];
    }
    const end = Math.min(this.position + Math.max(0, length), this.bytes.byteLength);
    const chunk = this.bytes.slice(this.position, end);
    this.position = end;
    return chunk;
  }
}

/** UTF-8 line reader. Lines are returned without their terminator. */
export class TextLineReader {
  private readonly decoder = new TextDecoder('utf-8');
  private pending = '';
  private exhausted = false;

  constructor(
    private readonly source: ByteStream,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE
  ) {}

  /** Next line, or null once the stream is exhausted. */
  readLine(): string | null {
    for (;;) {
      const match = LINE_BREAK.exec(this.pending);
      // A trailing '\r' may be the first half of '\r\n'; read on before deciding.
      const splitCrlf = match !== null && match[0] === '\r' && match.index === this.pending.length - 1;
      if (match && (!splitCrlf || this.exhausted)) {
        const line = this.pending.slice(0, match.index);
        this.pending = this.pending.slice(match.index + match[0].length);
        return line;
      }

      if (this.exhausted) {
        if (this.pending === '') return null;
        const line = this.pending;
        this.pending = '';
        return line;
      }

      this.fill();
    }
  }

  *lines(): Generator<string> {
    let line: string | null;
    while ((line = this.readLine()) !== null) {
      yield line;
    }
  }

  private fill(): void {
    if (this.source.isFinished) {
      this.pending += this.decoder.decode();
      this.exhausted = true;
      return;
    }
    this.pending += this.decoder.decode(this.source.read(this.chunkSize), { stream: true });
  }
}

function concat(chunks: Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}
