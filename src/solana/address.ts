import { PublicKey } from "@solana/web3.js";
import { Buffer } from "node:buffer";
import { LendingError } from "../engine/errors.js";

/**
 * Validates an identity or mint and returns its canonical base58 form.
 *
 * @param input - PublicKey or base58 string
 * @param ctx - Where the address is used (e.g. "deposit.owner"), included in errors
 */
export function addressSafe(input: PublicKey | string, ctx: string): string {
  if (input instanceof PublicKey) {
    return input.toBase58();
  }
  const s = input.trim();
  if (s.length < 32 || s.length > 44) {
    throw new LendingError("InvalidParameter", `${ctx}: invalid address length ${s.length}`);
  }
  try {
    return new PublicKey(s).toBase58();
  } catch (err) {
    throw new LendingError("InvalidParameter", `${ctx}: ${JSON.stringify(s)} is not a valid address`, {
      cause: err,
    });
  }
}

function programId(program: string): PublicKey {
  return new PublicKey(addressSafe(program, "programId"));
}

export function deriveMarketAddress(authority: string, program: string): string {
  const [pda] = PublicKey.findProgramAddressSync(
    [Buffer.from("market"), new PublicKey(authority).toBuffer()],
    programId(program)
  );
  return pda.toBase58();
}

export function deriveReserveAddress(market: string, mint: string, program: string): string {
  const [pda] = PublicKey.findProgramAddressSync(
    [Buffer.from("reserve"), new PublicKey(market).toBuffer(), new PublicKey(mint).toBuffer()],
    programId(program)
  );
  return pda.toBase58();
}

export function derivePermanentAccountAddress(market: string, program: string): string {
  const [pda] = PublicKey.findProgramAddressSync(
    [Buffer.from("permanent_account"), new PublicKey(market).toBuffer()],
    programId(program)
  );
  return pda.toBase58();
}
