// src/core/api-client.ts

import type { Writable } from 'stream';
import { finished } from 'stream/promises';

/**
 * The shared network client. The diagnostics hook attaches a stats sink to
 * it; the runner closes it once the command has finished.
 */
export interface ApiClient {
  logHttpStats(sink: Writable): void;
  close(): Promise<void>;
}

export interface HttpStat {
  method: string;
  url: string;
  status: number;
  durationMs: number;
}

export class HttpApiClient implements ApiClient {
  private statsSink: Writable | null = null;
  private closed = false;
  private requestCount = 0;

  constructor(
    private userAgent: string,
    private fetchImpl: typeof fetch = fetch
  ) {}

  logHttpStats(sink: Writable): void {
    this.statsSink = sink;
    sink.write(`concurrent=1 time=${Math.floor(Date.now() / 1000)} version=${this.userAgent}\n`);
  }

  async request(url: string, init: RequestInit = {}): Promise<Response> {
    const method = init.method ?? 'GET';
    const headers = new Headers(init.headers);
    headers.set('User-Agent', this.userAgent);

    const started = performance.now();
    const response = await this.fetchImpl(url, { ...init, method, headers });

    this.recordStat({
      method,
      url,
      status: response.status,
      durationMs: Math.round(performance.now() - started),
    });

    return response;
  }

  recordStat(stat: HttpStat): void {
    this.requestCount++;
    this.statsSink?.write(
      `key=http.request request=${this.requestCount} method=${stat.method} url=${stat.url} ` +
      `status=${stat.status} duration=${stat.durationMs}ms\n`
    );
  }

  /**
   * Flush and end the stats sink. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const sink = this.statsSink;
    this.statsSink = null;
    if (sink) {
      sink.end();
      await finished(sink);
    }
  }
}
