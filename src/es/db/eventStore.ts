import type { Tagged } from "../domain/decider";
import { StreamClosedError } from "../domain/errors";

export type StreamId = string;

/** Row shape of the `events` table. */
export type PersistedEvent = {
  stream_id: StreamId;
  sequence_number: number;
  event_type: string;
  payload: unknown;
  /** A final event closes its stream. */
  final: boolean;
  occurred_at: Date;
};

export type StoredSnapshot = {
  stream_id: StreamId;
  version: number;
  state: unknown;
  created_at?: Date;
};

/**
 * Append-only, per-stream log. Every call runs against the transaction handle
 * given by `withTx`, so load -> decide -> append is one unit of work.
 *
 * Sequence numbers start at 1; an empty stream is at version 0.
 */
export interface EventStore<Tx> {
  withTx<T>(fn: (tx: Tx) => Promise<T>): Promise<T>;

  /** Events with `sequence_number > afterVersion`, ascending. */
  loadEvents(tx: Tx, streamId: StreamId, afterVersion?: number): Promise<PersistedEvent[]>;

  /**
   * Appends `events` at `expectedVersion + 1 ..`. Throws ConcurrencyError when
   * the stream is no longer at `expectedVersion`, and StreamClosedError when it
   * already holds a final event. `final[i]` marks `events[i]` as final; only
   * the last event of a batch may be.
   */
  appendEvents(
    tx: Tx,
    streamId: StreamId,
    expectedVersion: number,
    events: readonly Tagged[],
    final?: readonly boolean[]
  ): Promise<PersistedEvent[]>;

  getLatestSnapshot(tx: Tx, streamId: StreamId): Promise<StoredSnapshot | null>;
  saveSnapshot(tx: Tx, snapshot: StoredSnapshot): Promise<void>;
}

/** Splits a tagged event into the `event_type` column and its JSON payload. */
export function toRecord(event: Tagged): { event_type: string; payload: unknown } {
  return { event_type: event.type, payload: event };
}

export function assertAppendable(
  streamId: StreamId,
  closed: boolean,
  count: number,
  final: readonly boolean[]
): void {
  if (closed) {
    throw new StreamClosedError(`stream ${streamId} is closed by a final event`, streamId);
  }
  const firstFinal = final.slice(0, count).indexOf(true);
  if (firstFinal >= 0 && firstFinal < count - 1) {
    throw new StreamClosedError(`events follow a final event in the batch for stream ${streamId}`, streamId);
  }
}
