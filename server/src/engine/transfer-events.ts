import type { ObjectId, SessionOutcome, TransferEvent } from "../models/transfer.model";

/** Event published once a session reaches a terminal state. */
export function toTransferEvent(
  outcome: SessionOutcome,
  session: { sessionId: string; objectId: ObjectId },
  at: Date = new Date(),
): TransferEvent {
  const base = {
    sessionId: session.sessionId,
    objectId: session.objectId,
    timestamp: at.toISOString(),
  };

  switch (outcome.state) {
    case "completed":
      return {
        ...base,
        event: "transfer_complete",
        size: outcome.metadata.size,
        ...(outcome.metadata.checksum !== undefined && { checksum: outcome.metadata.checksum }),
      };
    case "failed":
      return {
        ...base,
        event: "transfer_failed",
        confirmedOffset: outcome.confirmedOffset,
        reason: outcome.error.message,
      };
    case "cancelled":
      return {
        ...base,
        event: "transfer_cancelled",
        confirmedOffset: outcome.confirmedOffset,
      };
  }
}
