import type { FlashLoanStrategy } from "./flashLoanExecutor.js";
import { checkedAdd } from "../math/checked.js";

/**
 * One-step leverage loop on a single reserve: the flash-borrowed amount is
 * deposited as the owner's collateral, then amount + fee is borrowed against
 * it and handed back to close the loan.
 *
 * Net effect for the owner: +amount deposit, +(amount + fee) debt.
 */
export function multiplyStrategy(owner: string): FlashLoanStrategy {
  return scope => {
    scope.deposit(owner, scope.reserve, scope.amount);
    const owed = checkedAdd(scope.amount, scope.fee);
    scope.borrow(owner, scope.reserve, owed);
    return owed;
  };
}
