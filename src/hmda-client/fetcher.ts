import { HttpError, TransportError } from '../utils/errors.js';

export interface BodyFetcher {
  fetchText(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  /** Abort the request after this many milliseconds; 0 disables the limit */
  timeoutMs?: number;
  verbose?: boolean;
}

// One GET per call, no retry
export class HttpFetcher implements BodyFetcher {
  private timeoutMs: number;
  private verbose: boolean;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.verbose = options.verbose ?? false;
  }

  async fetchText(url: string): Promise<string> {
    if (this.verbose) {
      console.log(`🚀 GET ${url}`);
    }

    let response: Response;
    try {
      response = await fetch(url, {
        signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined
      });
    } catch (error) {
      const failure = new TransportError(url, error);
      if (this.verbose) {
        console.error(`❌ ${failure.message}`);
      }
      throw failure;
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new TransportError(url, error);
    }

    if (!response.ok) {
      if (this.verbose) {
        console.error(`❌ Data Browser returned ${response.status} ${response.statusText}`);
      }
      throw new HttpError(url, response.status, response.statusText, body);
    }

    if (this.verbose) {
      console.log(`✅ Received ${body.length} bytes (${response.headers.get('content-type') ?? 'unknown type'})`);
    }
    return body;
  }
}
