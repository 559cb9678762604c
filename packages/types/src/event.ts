/**
 * Event Types
 *
 * Every committed state transition is announced as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events describe committed state only; a rolled-back operation
 *   produces no event
 * - Delivery is fire-and-forget and never feeds back into engine state
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that caused this event */
  readonly actor: string;

  /** ID for grouping related events (the wallet address) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "wallet" | "proposal";
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "multisig.proposal.created") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
