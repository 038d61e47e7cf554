import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { errorMessage } from "../core/errors.js";
import type { AppConfig, DocumentLoader, LoadedPage } from "../core/types.js";

export interface HttpLoaderOptions {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

export class HttpDocumentLoader implements DocumentLoader {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpLoaderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async load(source: string): Promise<LoadedPage> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(source, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
        redirect: "follow",
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Request timed out after ${this.options.timeoutMs}ms: ${source}`);
      }
      throw new Error(`Request failed for ${source}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText} for ${source}`.trim());
    }

    return { source, html: await response.text() };
  }
}

export class FileDocumentLoader implements DocumentLoader {
  async load(source: string): Promise<LoadedPage> {
    const html = await readFile(resolve(source), "utf8");
    return { source, html };
  }
}

/** Routes http(s) URLs to the network and everything else to the filesystem. */
export class RoutingDocumentLoader implements DocumentLoader {
  constructor(
    private readonly http: DocumentLoader,
    private readonly file: DocumentLoader,
  ) {}

  load(source: string): Promise<LoadedPage> {
    return isHttpUrl(source) ? this.http.load(source) : this.file.load(source);
  }
}

export function createDocumentLoader(config: AppConfig): DocumentLoader {
  return new RoutingDocumentLoader(
    new HttpDocumentLoader({
      timeoutMs: config.http.timeoutMs,
      userAgent: config.http.userAgent,
    }),
    new FileDocumentLoader(),
  );
}

export function isHttpUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}
