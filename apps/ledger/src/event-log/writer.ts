/**
 * Event log writer: in-memory append-only store.
 *
 * The ledger appends after an operation commits, so the log never holds
 * an event for a rolled-back operation.
 */

import { digestObject } from "@givepool/protocol";
import type { EventPayload, LedgerEvent } from "./schemas.js";

export class EventLog {
  private readonly events: LedgerEvent[] = [];

  append(type: string, timestamp: number, payload: EventPayload): LedgerEvent {
    const seq = this.events.length;
    const event: LedgerEvent = {
      seq,
      id: digestObject({ seq, type, timestamp, payload }),
      type,
      timestamp,
      payload,
    };
    this.events.push(event);
    return event;
  }

  getEvents(fromSeq: number = 0): LedgerEvent[] {
    return this.events.slice(fromSeq);
  }

  getEventsByType(type: string, fromSeq: number = 0): LedgerEvent[] {
    return this.events.slice(fromSeq).filter((e) => e.type === type);
  }

  getEventCount(): number {
    return this.events.length;
  }
}
