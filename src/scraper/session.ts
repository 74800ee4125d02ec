import axios, { AxiosAdapter, AxiosInstance } from "axios";
import { FetchError } from "../errors";
import { log } from "../utils/logger";

export interface SessionOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  /** Replaces axios' HTTP transport (used by tests). */
  adapter?: AxiosAdapter;
}

const DEFAULT_HEADERS = {
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/png,image/svg+xml,*/*;q=0.8",
  "accept-language": "en-US,en;q=0.5",
  "upgrade-insecure-requests": "1",
  "sec-fetch-dest": "document",
  "sec-fetch-mode": "navigate",
  "sec-fetch-site": "none",
  "sec-fetch-user": "?1",
  priority: "u=0, i",
};

/**
 * One browsing session against the portal: shared cookies, one attempt per request.
 *
 * ASP.NET keeps the form's server-side state under the session cookie, so every
 * request of a lookup has to go through the same instance.
 */
export class PortalSession {
  private readonly http: AxiosInstance;
  private readonly cookies = new Map<string, string>();

  constructor(private readonly options: SessionOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      responseType: "text",
      maxRedirects: 5,
      headers: { ...DEFAULT_HEADERS, "user-agent": options.userAgent },
      adapter: options.adapter,
    });
  }

  url(path: string): string {
    return new URL(path, this.options.baseUrl).toString();
  }

  async get(path: string, headers: Record<string, string> = {}): Promise<string> {
    return this.send({ method: "GET", url: path }, headers);
  }

  async post(path: string, form: Record<string, string>): Promise<string> {
    return this.send(
      { method: "POST", url: path, data: new URLSearchParams(form).toString() },
      { "content-type": "application/x-www-form-urlencoded" }
    );
  }

  cookieHeader(): string {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
  }

  private async send(
    config: { method: "GET" | "POST"; url: string; data?: string },
    headers: Record<string, string>
  ): Promise<string> {
    const cookie = this.cookieHeader();
    log({ stage: "portal_request", method: config.method, path: config.url });

    try {
      const response = await this.http.request<string>({
        ...config,
        headers: cookie ? { ...headers, cookie } : headers,
      });
      this.storeCookies(response.headers["set-cookie"]);
      return response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        if (err.response) {
          throw new FetchError(
            "http",
            `${config.method} ${config.url} returned HTTP ${err.response.status}`,
            { cause: err }
          );
        }
        throw new FetchError("network", `${config.method} ${config.url} failed: ${err.message}`, {
          cause: err,
        });
      }
      throw err;
    }
  }

  private storeCookies(setCookie: unknown) {
    if (!Array.isArray(setCookie)) return;
    for (const entry of setCookie) {
      if (typeof entry !== "string") continue;
      const pair = entry.split(";")[0];
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }
}
