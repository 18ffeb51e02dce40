import { FetchError, describeError } from "../core/errors";

export interface SourceFetcher {
  fetchPage(): Promise<string>;
}

interface HttpSourceFetcherOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class HttpSourceFetcher implements SourceFetcher {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpSourceFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchPage(): Promise<string> {
    const { url, timeoutMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: defaultHeaders(),
        signal: controller.signal
      });

      if (!response.ok) {
        throw new FetchError(`Source responded with status ${response.status}`, url, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }

      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : describeError(error);
      throw new FetchError(`Could not fetch ${url}: ${reason}`, url, undefined, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}

function defaultHeaders(): Record<string, string> {
  return {
    "user-agent":
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
    "accept-language": "fr-FR,fr;q=0.9,en;q=0.8"
  };
}
