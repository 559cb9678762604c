/**
 * @cosign/record-store — Derived authority addresses.
 *
 * A derived address is computed from a list of seeds and the id of the
 * component that owns it:
 *
 *   address = sha256(seed₁ ‖ … ‖ seedₙ ‖ [bump] ‖ ownerId ‖ "DerivedAuthority")
 *
 * The bump byte is searched from 255 downward until the digest is NOT a
 * valid Ed25519 point, so no private key can exist for the address. The
 * same seeds and owner always give the same address and bump.
 */

import { createHash } from "node:crypto";
import { ed25519 } from "@noble/curves/ed25519";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { Address } from "@cosign/types";
import { isAddress } from "@cosign/types";

export const MAX_SEED_LENGTH = 32;
export const MAX_SEEDS = 16;

const DERIVATION_MARKER = utf8ToBytes("DerivedAuthority");

/**
 * A derivation seed: UTF-8 text, raw bytes, or an unsigned integer
 * (encoded as 8 bytes little-endian).
 */
export type Seed = string | Uint8Array | number;

export interface DerivedAddress {
  readonly address: Address;
  readonly bump: number;
}

// =============================================================================
// Errors
// =============================================================================

export type DerivationErrorCode =
  | "SEED_TOO_LONG"
  | "TOO_MANY_SEEDS"
  | "INVALID_SEED"
  | "INVALID_BUMP"
  | "ON_CURVE"
  | "NO_VIABLE_BUMP";

export class DerivationError extends Error {
  public readonly code: DerivationErrorCode;
  constructor(code: DerivationErrorCode, message: string) {
    super(message);
    this.name = "DerivationError";
    this.code = code;
  }
}

// =============================================================================
// Seeds
// =============================================================================

/**
 * Encode an unsigned integer as an 8-byte little-endian seed.
 */
export function seedFromIndex(index: number): Uint8Array {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new DerivationError(
      "INVALID_SEED",
      `Integer seed must be a non-negative safe integer, got ${index}`,
    );
  }
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, BigInt(index), true);
  return bytes;
}

/**
 * Use the raw 32 bytes of an address as a seed.
 */
export function seedFromAddress(address: Address): Uint8Array {
  if (!isAddress(address)) {
    throw new DerivationError("INVALID_SEED", `Not a 32-byte hex address: "${address}"`);
  }
  return hexToBytes(address);
}

function encodeSeed(seed: Seed): Uint8Array {
  if (typeof seed === "string") return utf8ToBytes(seed);
  if (typeof seed === "number") return seedFromIndex(seed);
  return seed;
}

function encodeSeeds(seeds: readonly Seed[]): Uint8Array[] {
  if (seeds.length > MAX_SEEDS) {
    throw new DerivationError(
      "TOO_MANY_SEEDS",
      `At most ${MAX_SEEDS} seeds are allowed, got ${seeds.length}`,
    );
  }
  return seeds.map((seed, i) => {
    const bytes = encodeSeed(seed);
    if (bytes.length > MAX_SEED_LENGTH) {
      throw new DerivationError(
        "SEED_TOO_LONG",
        `Seed ${i} is ${bytes.length} bytes, maximum is ${MAX_SEED_LENGTH}`,
      );
    }
    return bytes;
  });
}

// =============================================================================
// Derivation
// =============================================================================

function digest(encoded: readonly Uint8Array[], bump: number, ownerId: string): Uint8Array {
  const hash = createHash("sha256");
  for (const seed of encoded) hash.update(seed);
  hash.update(Uint8Array.of(bump));
  hash.update(utf8ToBytes(ownerId));
  hash.update(DERIVATION_MARKER);
  return new Uint8Array(hash.digest());
}

/**
 * Whether 32 bytes decode to a point on the Ed25519 curve.
 */
export function isOnCurve(bytes: Uint8Array): boolean {
  try {
    ed25519.ExtendedPoint.fromHex(bytes);
    return true;
  } catch {
    return false;
  }
}

/**
 * Derive the address for seeds + bump under an owner.
 *
 * @throws DerivationError ON_CURVE if this bump yields an address that
 *   could have a private key
 */
export function createDerivedAddress(
  seeds: readonly Seed[],
  bump: number,
  ownerId: string,
): Address {
  if (!Number.isInteger(bump) || bump < 0 || bump > 255) {
    throw new DerivationError("INVALID_BUMP", `Bump must be an integer 0-255, got ${bump}`);
  }
  const bytes = digest(encodeSeeds(seeds), bump, ownerId);
  if (isOnCurve(bytes)) {
    throw new DerivationError("ON_CURVE", `Bump ${bump} yields an on-curve address`);
  }
  return bytesToHex(bytes);
}

/**
 * Find the canonical derived address: the highest bump whose digest is
 * off the curve.
 */
export function findDerivedAddress(
  seeds: readonly Seed[],
  ownerId: string,
): DerivedAddress {
  const encoded = encodeSeeds(seeds);
  for (let bump = 255; bump >= 0; bump--) {
    const bytes = digest(encoded, bump, ownerId);
    if (!isOnCurve(bytes)) {
      return { address: bytesToHex(bytes), bump };
    }
  }
  throw new DerivationError("NO_VIABLE_BUMP", "No bump yields an off-curve address");
}
