/**
 * Response body tap.
 * The wrapped response forwards every chunk the handler produces, unchanged
 * and in order, while keeping a copy. Status, statusText and headers are
 * carried over as-is. Chunks are pulled from the handler's stream as the
 * client reads, so streaming responses keep streaming.
 */

import { ResponseCaptureError } from '../errors.js';

type CaptureState =
  | { kind: 'open' }
  | { kind: 'complete' }
  | { kind: 'failed'; error: ResponseCaptureError };

export class ResponseCapture {
  /** The response to hand to the client. */
  readonly response: Response;

  private readonly chunks: Uint8Array[] = [];
  private byteCount = 0;
  private state: CaptureState = { kind: 'open' };
  private readonly settled: Promise<void>;
  private settle: () => void = () => {};

  private constructor(original: Response) {
    this.settled = new Promise<void>((resolve) => {
      this.settle = resolve;
    });

    if (original.body === null) {
      this.response = original;
      this.complete();
      return;
    }

    this.response = new Response(this.mirror(original.body), {
      status: original.status,
      statusText: original.statusText,
      headers: original.headers,
    });
  }

  static wrap(response: Response): ResponseCapture {
    return new ResponseCapture(response);
  }

  /** Bytes retained so far. */
  get capturedBytes(): number {
    return this.byteCount;
  }

  get isComplete(): boolean {
    return this.state.kind !== 'open';
  }

  /**
   * The full body as written, decoded as UTF-8. Resolves when the body
   * stream ends; rejects with ResponseCaptureError if it errored or the
   * client cancelled it before the end.
   */
  async capturedText(): Promise<string> {
    await this.settled;
    if (this.state.kind === 'failed') throw this.state.error;
    return this.decode();
  }

  private mirror(source: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
    const reader = source.getReader();

    return new ReadableStream<Uint8Array>({
      pull: async (controller) => {
        try {
          const { done, value } = await reader.read();
          if (done) {
            this.complete();
            controller.close();
            return;
          }
          this.chunks.push(value.slice());
          this.byteCount += value.byteLength;
          controller.enqueue(value);
        } catch (err) {
          this.fail('Response body stream failed', err);
          controller.error(err);
        }
      },
      cancel: async (reason) => {
        this.fail('Response body cancelled by the client', reason);
        await reader.cancel(reason);
      },
    });
  }

  private complete(): void {
    if (this.state.kind !== 'open') return;
    this.state = { kind: 'complete' };
    this.settle();
  }

  private fail(message: string, cause: unknown): void {
    if (this.state.kind !== 'open') return;
    this.state = {
      kind: 'failed',
      error: new ResponseCaptureError(message, this.decode(), cause),
    };
    this.settle();
  }

  private decode(): string {
    const decoder = new TextDecoder('utf-8');
    let text = '';
    for (const chunk of this.chunks) {
      text += decoder.decode(chunk, { stream: true });
    }
    return text + decoder.decode();
  }
}
