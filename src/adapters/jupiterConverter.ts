import { z } from "zod";
import type { LiquidityConverter } from "./capabilities.js";
import { HttpStatusError, isTransient } from "./capabilities.js";
import { withRetry } from "../utils/retry.js";
import { logger } from "../observability/logger.js";

const QuoteResponseSchema = z.object({
  inAmount: z.string().regex(/^\d+$/),
  outAmount: z.string().regex(/^\d+$/),
  /** Minimum out after slippage */
  otherAmountThreshold: z.string().regex(/^\d+$/).optional(),
  priceImpactPct: z.string().optional(),
});

export type JupiterQuote = z.infer<typeof QuoteResponseSchema>;

export interface JupiterConverterOpts {
  quoteUrl: string;
  baseMint: string;
  derivativeMint: string;
  slippageBps: number;
  maxRetries?: number;
  retryDelayMs?: number;
  fetchFn?: typeof fetch; // allow injection for tests
}

/**
 * Liquidity converter priced from the Jupiter v6 quote API.
 *
 * Amounts go over the wire as base-unit strings; the converter credits the
 * slippage-protected minimum (otherAmountThreshold) when the quote has one.
 */
export class JupiterLiquidityConverter implements LiquidityConverter {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly opts: JupiterConverterOpts) {
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  convert(amount: bigint): Promise<bigint> {
    return this.quoteOut(this.opts.baseMint, this.opts.derivativeMint, amount);
  }

  redeem(amount: bigint): Promise<bigint> {
    return this.quoteOut(this.opts.derivativeMint, this.opts.baseMint, amount);
  }

  async quote(inputMint: string, outputMint: string, amount: bigint): Promise<JupiterQuote> {
    const url = new URL(this.opts.quoteUrl);
    url.searchParams.set("inputMint", inputMint);
    url.searchParams.set("outputMint", outputMint);
    url.searchParams.set("amount", amount.toString());
    url.searchParams.set("slippageBps", String(this.opts.slippageBps));
    url.searchParams.set("swapMode", "ExactIn");

    return withRetry(
      async () => {
        const resp = await this.fetchFn(url.toString());
        if (!resp.ok) {
          throw new HttpStatusError(url.pathname, resp.status, resp.statusText);
        }
        return QuoteResponseSchema.parse(await resp.json());
      },
      {
        maxRetries: this.opts.maxRetries ?? 2,
        delayMs: this.opts.retryDelayMs ?? 200,
        shouldRetry: isTransient,
        label: "jupiter_quote",
      }
    );
  }

  private async quoteOut(inputMint: string, outputMint: string, amount: bigint): Promise<bigint> {
    const q = await this.quote(inputMint, outputMint, amount);
    const out = BigInt(q.otherAmountThreshold ?? q.outAmount);
    logger.debug(
      { event: "jupiter_quote", inputMint, outputMint, inAmount: q.inAmount, outAmount: q.outAmount, credited: out.toString() },
      "quote received"
    );
    return out;
  }
}
