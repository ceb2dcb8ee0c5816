/**
 * @muxkit/core - Response Recorder
 *
 * In-memory {@link ResponseWriter}. Useful for calling a finalized router
 * directly, without a server, and for asserting on what a handler wrote.
 *
 * @example
 * ```typescript
 * const recorder = new ResponseRecorder();
 * await handler(createRequest({ url: '/hello' }), recorder);
 * recorder.statusCode; // 200
 * recorder.body;       // 'world'
 * ```
 */

import { HeaderValue, HttpStatus, ResponseWriter } from './types';

export class ResponseRecorder implements ResponseWriter {
  private status: number = HttpStatus.OK;
  private readonly headers = new Map<string, HeaderValue>();
  private readonly chunks: Buffer[] = [];
  private sent = false;
  private ended = false;

  get statusCode(): number {
    return this.status;
  }

  get headersSent(): boolean {
    return this.sent;
  }

  get writableEnded(): boolean {
    return this.ended;
  }

  /**
   * Everything written so far, decoded as UTF-8
   */
  get body(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  setHeader(name: string, value: HeaderValue): void {
    this.assertHeadersWritable();
    this.headers.set(name.toLowerCase(), value);
  }

  getHeader(name: string): HeaderValue | undefined {
    return this.headers.get(name.toLowerCase());
  }

  getHeaders(): Record<string, HeaderValue> {
    return Object.fromEntries(this.headers);
  }

  removeHeader(name: string): void {
    this.assertHeadersWritable();
    this.headers.delete(name.toLowerCase());
  }

  writeHead(statusCode: number, headers: Record<string, HeaderValue> = {}): void {
    this.assertHeadersWritable();
    for (const [name, value] of Object.entries(headers)) {
      this.headers.set(name.toLowerCase(), value);
    }
    this.status = statusCode;
    this.sent = true;
  }

  write(chunk: string | Uint8Array): void {
    if (this.ended) {
      throw new Error('Cannot write after end');
    }
    if (!this.sent) {
      this.writeHead(this.status);
    }
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }

  end(chunk?: string | Uint8Array): void {
    if (this.ended) {
      return;
    }
    if (chunk !== undefined) {
      this.write(chunk);
    } else if (!this.sent) {
      this.writeHead(this.status);
    }
    this.ended = true;
  }

  private assertHeadersWritable(): void {
    if (this.sent) {
      throw new Error('Cannot set headers after they are sent to the client');
    }
  }
}
