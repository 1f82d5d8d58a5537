export interface ConnectionChecker {
  isConnected(): Promise<boolean>;
}

type ProbeOptions = {
  probeUrls: string[];
  timeoutMs: number;
  fetch?: typeof fetch;
};

/**
 * Online when any probe URL answers without a server error before its timeout.
 * Probes run one after another and the result is never cached.
 */
export class HttpConnectionChecker implements ConnectionChecker {
  private readonly probeUrls: string[];
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor({ probeUrls, timeoutMs, fetch: customFetch }: ProbeOptions) {
    this.probeUrls = probeUrls;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = customFetch ?? fetch;
  }

  async isConnected(): Promise<boolean> {
    for (const url of this.probeUrls) {
      if (await this.probe(url)) {
        return true;
      }
    }
    return false;
  }

  private async probe(url: string): Promise<boolean> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'HEAD',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.status < 500;
    } catch (error) {
      console.warn(`Connectivity probe failed for ${url}`, error);
      return false;
    }
  }
}
