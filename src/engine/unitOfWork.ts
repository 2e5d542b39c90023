import { AsyncLocalStorage } from "node:async_hooks";
import type { LedgerState } from "./types.js";
import { LendingError, isLendingError } from "./errors.js";
import type { LendingErrorCode } from "./errors.js";
import { logger } from "../observability/logger.js";

export interface UnitContext {
  /** Mutable copy of the ledger; committed only if the unit succeeds */
  draft: LedgerState;
  /** Timestamp shared by every step of the unit */
  now: number;
  label: string;
}

export interface RunOptions {
  /** Error raised when the unit is started from inside another unit (default InvalidParameter) */
  reentrantCode?: LendingErrorCode;
}

/**
 * Runs operations one at a time, each against a private draft of the ledger.
 *
 * A unit either commits its whole draft or leaves the committed state exactly
 * as it was: typed rejections, strategy exceptions and capability failures all
 * discard the draft. Units queue in call order, so an awaited capability call
 * inside one unit never interleaves with another unit.
 *
 * A unit cannot start another one on the same ledger: it would wait behind
 * itself forever. Such calls reject at once with `reentrantCode`.
 */
export class UnitOfWork {
  private committed: LedgerState;
  private tail: Promise<unknown> = Promise.resolve();
  private committedUnits = 0;
  private rejectedUnits = 0;
  private readonly active = new AsyncLocalStorage<string>();

  constructor(initial: LedgerState) {
    this.committed = initial;
  }

  /** Deep copy of the committed state */
  read(): LedgerState {
    return structuredClone(this.committed);
  }

  /** Read-only view without copying; callers must not mutate it */
  peek(): Readonly<LedgerState> {
    return this.committed;
  }

  get stats(): { committed: number; rejected: number } {
    return { committed: this.committedUnits, rejected: this.rejectedUnits };
  }

  run<T>(
    label: string,
    now: () => number,
    fn: (ctx: UnitContext) => T | Promise<T>,
    opts: RunOptions = {}
  ): Promise<T> {
    const outer = this.active.getStore();
    if (outer !== undefined) {
      this.rejectedUnits++;
      const code = opts.reentrantCode ?? "InvalidParameter";
      logger.info({ event: "unit_reentered", unit: label, outer, code }, "unit rejected");
      return Promise.reject(
        new LendingError(code, `${label} started from inside ${outer}; use the scope handed to the running unit`)
      );
    }
    const next = this.tail.then(() => this.active.run(label, () => this.execute(label, now(), fn)));
    // keep the queue alive after a rejection; the caller still sees it
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async execute<T>(
    label: string,
    now: number,
    fn: (ctx: UnitContext) => T | Promise<T>
  ): Promise<T> {
    const draft = structuredClone(this.committed);
    try {
      const result = await fn({ draft, now, label });
      this.committed = draft;
      this.committedUnits++;
      logger.debug({ event: "unit_committed", unit: label, now }, "unit committed");
      return result;
    } catch (err) {
      this.rejectedUnits++;
      if (isLendingError(err)) {
        logger.info(
          { event: "unit_rejected", unit: label, code: err.code, errorNumber: err.errorNumber, reason: err.message },
          "unit rejected"
        );
      } else {
        logger.warn({ event: "unit_failed", unit: label, err }, "unit failed");
      }
      throw err;
    }
  }
}
