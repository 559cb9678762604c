/**
 * Identity Types
 *
 * Signers are identified by Ed25519 public keys. Records managed by the
 * engine live at derived addresses that have no private key at all.
 *
 * Rules:
 * - Both are encoded as 64 lowercase hex characters (32 bytes)
 * - Proof of possession of an identity key is checked before the engine
 *   sees a call; the engine only compares keys
 */

/**
 * Hex-encoded Ed25519 public key of a signer or caller.
 */
export type IdentityKey = string;

/**
 * Hex-encoded 32-byte address of a record.
 */
export type Address = string;
