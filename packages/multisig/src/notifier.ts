/**
 * Notifiers — where committed engine operations get announced.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent } from "@cosign/types";
import { MULTISIG_EVENTS, walletStreamId } from "@cosign/event-store";
import type { EventStore } from "@cosign/event-store";
import type { MultisigEvent, Notifier } from "./types.js";

/**
 * Appends every notification to the wallet's stream in an EventStore.
 */
export class EventStoreNotifier implements Notifier {
  private readonly store: EventStore;
  private readonly now: () => Date;

  constructor(store: EventStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  notify(event: MultisigEvent): void {
    this.store.append(walletStreamId(event.wallet), [this.toDomainEvent(event)]);
  }

  private toDomainEvent(event: MultisigEvent): DomainEvent {
    return {
      type: event.type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this.now().toISOString(),
        actor: event.actor,
        correlationId: event.wallet,
        source: event.type === MULTISIG_EVENTS.WALLET_INITIALIZED ? "wallet" : "proposal",
      },
      payload: { ...event.payload },
    };
  }
}

/**
 * Collects notifications in memory, in delivery order.
 */
export class RecordingNotifier implements Notifier {
  readonly events: MultisigEvent[] = [];

  notify(event: MultisigEvent): void {
    this.events.push(event);
  }
}
