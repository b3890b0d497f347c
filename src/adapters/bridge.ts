import { Agent, fetch, type Dispatcher, type Response } from "undici";
import type { Config } from "../util/config.js";
import { BackendError, ProtocolError, describeError } from "../util/errors.js";
import { TokenBucketLimiter } from "../util/limiter.js";
import { createLogger, type Logger } from "../util/log.js";
import type { Backend, HttpMethod, JsonBody } from "../util/types.js";

export type HueBridgeOptions = {
  baseUrl: string;
  username: string;
  dryRun?: boolean;
  insecureTls?: boolean;
  limiter?: TokenBucketLimiter;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  logger?: Logger;
};

/** REST access to one bridge: `<base>/api/<username>/<segments...>`. */
export class HueBridge implements Backend {
  private readonly baseUrl: string;
  private readonly username: string;
  private readonly dryRun: boolean;
  private readonly limiter: TokenBucketLimiter;
  private readonly dispatcher?: Dispatcher;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: HueBridgeOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.username = opts.username;
    this.dryRun = opts.dryRun ?? false;
    this.limiter = opts.limiter ?? new TokenBucketLimiter(10);
    this.timeoutMs = opts.timeoutMs ?? 5000;
    this.log = opts.logger ?? createLogger("bridge");
    // Bridges serve a self-signed certificate.
    this.dispatcher =
      opts.dispatcher ?? (opts.insecureTls ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined);
  }

  static fromConfig(config: Config, logger?: Logger): HueBridge {
    return new HueBridge({
      baseUrl: config.bridgeUrl,
      username: config.username,
      dryRun: config.dryRun,
      insecureTls: config.insecureTls,
      limiter: new TokenBucketLimiter(config.rateRps),
      logger,
    });
  }

  url(pathSegments: string[]): string {
    const path = [this.username, ...pathSegments].map((s) => encodeURIComponent(s)).join("/");
    return `${this.baseUrl}/api/${path}`;
  }

  async request(pathSegments: string[], method: HttpMethod, body?: JsonBody): Promise<unknown> {
    const url = this.url(pathSegments);
    const payload = body === undefined ? undefined : JSON.stringify(body); // drops undefined fields

    const route = `${method} /${pathSegments.join("/")}`;
    let res: Response;
    let text: string;

    if (this.dryRun && method !== "GET") {
      this.log.info(`[DRY-RUN] ${route}`, payload ?? "");
      return [{ success: { [`/${pathSegments.join("/")}`]: payload ?? "" } }];
    }

    await this.limiter.take();
    this.log.debug(route, payload ?? "");

    try {
      res = await fetch(url, {
        method,
        headers: payload === undefined ? undefined : { "Content-Type": "application/json" },
        body: payload,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await res.text();
    } catch (err) {
      throw new BackendError(`Bridge request ${route} failed: ${describeError(err)}`, { cause: err });
    }

    if (!res.ok) {
      throw new BackendError(`Bridge error ${res.status}: ${route} failed`, { status: res.status });
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ProtocolError(`Bridge returned non-JSON for ${route}`, { cause: err });
    }
  }
}
