import { z } from "zod";
import type { LeveragePositionProvider } from "./capabilities.js";
import { HttpStatusError, isTransient } from "./capabilities.js";
import { withRetry } from "../utils/retry.js";
import { logger } from "../observability/logger.js";

const OpenResponseSchema = z.object({
  positionId: z.string().min(1),
});

const CloseResponseSchema = z.object({
  positionId: z.string().min(1),
  closed: z.literal(true),
  proceeds: z.string().regex(/^\d+$/),
});

export interface HttpLeverageProviderOpts {
  baseUrl: string;
  maxRetries?: number;
  retryDelayMs?: number;
  fetchFn?: typeof fetch; // allow injection for tests
}

/**
 * Leverage venue reached over a small JSON API:
 *   POST {base}/positions              { owner, collateral } -> { positionId }
 *   POST {base}/positions/{id}/close                        -> { positionId, closed: true, proceeds }
 */
export class HttpLeverageProvider implements LeveragePositionProvider {
  private readonly fetchFn: typeof fetch;
  private readonly baseUrl: string;

  constructor(private readonly opts: HttpLeverageProviderOpts) {
    this.fetchFn = opts.fetchFn ?? fetch;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
  }

  async open(owner: string, collateral: bigint): Promise<string> {
    const body = await this.post("/positions", { owner, collateral: collateral.toString() });
    const { positionId } = OpenResponseSchema.parse(body);
    logger.info({ event: "leverage_opened", owner, collateral: collateral.toString(), positionId }, "leverage position opened");
    return positionId;
  }

  async close(handle: string): Promise<bigint> {
    const body = await this.post(`/positions/${encodeURIComponent(handle)}/close`, {});
    const { proceeds } = CloseResponseSchema.parse(body);
    logger.info({ event: "leverage_closed", positionId: handle, proceeds }, "leverage position closed");
    return BigInt(proceeds);
  }

  private post(path: string, payload: Record<string, string>): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    return withRetry(
      async () => {
        const resp = await this.fetchFn(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
        });
        if (!resp.ok) {
          throw new HttpStatusError(path, resp.status, resp.statusText);
        }
        const json: unknown = await resp.json();
        return json;
      },
      {
        maxRetries: this.opts.maxRetries ?? 2,
        delayMs: this.opts.retryDelayMs ?? 200,
        shouldRetry: isTransient,
        label: `leverage ${path}`,
      }
    );
  }
}
