/**
 * Per-operation context handed to every ledger component.
 */

import type { ParticipantId } from "@givepool/protocol";
import type { TokenMover, VaultAdapter } from "@givepool/vault-client";
import type { EventPayload } from "../event-log/schemas.js";
import { notAdministrator } from "./errors.js";
import type { LedgerDraft } from "./draft.js";

export interface LedgerSettings {
  /** Identity allowed to run batch lifecycle and root operations. Empty = nobody. */
  administrator: ParticipantId;
  /** Receives the operating fee of every donation. */
  operatingAddress: ParticipantId;
  /** Minimum queued shares before a batch may enter cooldown. */
  minimumBatchThreshold: bigint;
}

export interface LedgerContext {
  /** Working copy; committed only if the operation succeeds. */
  draft: LedgerDraft;
  vault: VaultAdapter;
  tokens: TokenMover;
  settings: LedgerSettings;
  now: () => number;
  /** Queue an event; it is written only if the operation commits. */
  emit: (type: string, payload: EventPayload) => void;
}

export function assertAdministrator(settings: LedgerSettings, caller: ParticipantId): void {
  if (settings.administrator === "" || caller !== settings.administrator) {
    throw notAdministrator(caller);
  }
}
