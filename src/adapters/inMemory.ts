import type { LeveragePositionProvider, LiquidityConverter } from "./capabilities.js";
import { BPS, mulDiv } from "../math/checked.js";

/**
 * Deterministic converter at a fixed rate (derivative per base asset, bps).
 * `failNext` makes the next call reject, for rollback tests.
 */
export class InMemoryLiquidityConverter implements LiquidityConverter {
  readonly calls: Array<{ kind: "convert" | "redeem"; amount: bigint }> = [];
  private pendingFailure: Error | null = null;

  constructor(private readonly rateBps: bigint = BPS) {}

  failNext(err: Error = new Error("conversion venue unavailable")): void {
    this.pendingFailure = err;
  }

  async convert(amount: bigint): Promise<bigint> {
    this.take("convert", amount);
    return mulDiv(amount, this.rateBps, BPS);
  }

  async redeem(amount: bigint): Promise<bigint> {
    this.take("redeem", amount);
    return mulDiv(amount, BPS, this.rateBps);
  }

  private take(kind: "convert" | "redeem", amount: bigint): void {
    if (this.pendingFailure) {
      const err = this.pendingFailure;
      this.pendingFailure = null;
      throw err;
    }
    this.calls.push({ kind, amount });
  }
}

export class InMemoryLeverageProvider implements LeveragePositionProvider {
  readonly positions = new Map<string, { owner: string; collateral: bigint }>();
  private nextId = 1;
  private failOpen = false;
  private failClose = false;

  failNextOpen(): void {
    this.failOpen = true;
  }

  failNextClose(): void {
    this.failClose = true;
  }

  async open(owner: string, collateral: bigint): Promise<string> {
    if (this.failOpen) {
      this.failOpen = false;
      throw new Error("leverage venue rejected open");
    }
    const handle = `position-${this.nextId++}`;
    this.positions.set(handle, { owner, collateral });
    return handle;
  }

  /** Returns the recorded collateral as proceeds */
  async close(handle: string): Promise<bigint> {
    if (this.failClose) {
      this.failClose = false;
      throw new Error("leverage venue rejected close");
    }
    const position = this.positions.get(handle);
    if (!position) {
      throw new Error(`unknown position ${handle}`);
    }
    this.positions.delete(handle);
    return position.collateral;
  }
}
