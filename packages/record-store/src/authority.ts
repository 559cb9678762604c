/**
 * @cosign/record-store — Authority tokens.
 *
 * A token asserts signing authority over one derived address. It can only
 * be minted by reproducing the address's seeds, bump and owner id, and it
 * stops being accepted once revoked. Plain objects shaped like a token
 * are never accepted.
 */

import type { Address } from "@cosign/types";
import { createDerivedAddress } from "./derive.js";
import type { Seed } from "./derive.js";

export interface AuthorityToken {
  /** The derived address this token speaks for */
  readonly address: Address;

  /** Owner id the address was derived under */
  readonly ownerId: string;

  /** True once revoke() has been called */
  readonly revoked: boolean;

  revoke(): void;
}

const minted = new WeakSet<AuthorityToken>();

class ScopedAuthority implements AuthorityToken {
  private _revoked = false;

  constructor(
    readonly address: Address,
    readonly ownerId: string,
  ) {}

  get revoked(): boolean {
    return this._revoked;
  }

  revoke(): void {
    this._revoked = true;
  }
}

/**
 * Mint a token for the address derived from `seeds`, `bump` and `ownerId`.
 *
 * @throws DerivationError if the seeds and bump do not derive an address
 */
export function mintAuthority(
  seeds: readonly Seed[],
  bump: number,
  ownerId: string,
): AuthorityToken {
  const token = new ScopedAuthority(createDerivedAddress(seeds, bump, ownerId), ownerId);
  minted.add(token);
  return token;
}

/**
 * Run `work` with a freshly minted token, revoking it when `work`
 * returns or throws.
 */
export function withAuthority<T>(
  seeds: readonly Seed[],
  bump: number,
  ownerId: string,
  work: (token: AuthorityToken) => T,
): T {
  const token = mintAuthority(seeds, bump, ownerId);
  try {
    return work(token);
  } finally {
    token.revoke();
  }
}

/**
 * Whether `token` is a live, genuinely minted token for `address`.
 */
export function isAuthorityFor(token: AuthorityToken, address: Address): boolean {
  return minted.has(token) && !token.revoked && token.address === address;
}
