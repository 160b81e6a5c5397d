import type { Tagged } from "../../domain/decider";
import { ConcurrencyError } from "../../domain/errors";
import { EventStore, PersistedEvent, StoredSnapshot, StreamId, assertAppendable, toRecord } from "../eventStore";

/**
 * Writes staged by one `withTx` call. Nothing here is visible to other
 * transactions until commit.
 */
export class InMemoryTx {
  readonly staged = new Map<StreamId, PersistedEvent[]>();
  readonly baseVersions = new Map<StreamId, number>();
  readonly snapshots: StoredSnapshot[] = [];
}

function lastVersion(list: readonly PersistedEvent[]): number {
  return list.length === 0 ? 0 : list[list.length - 1].sequence_number;
}

/**
 * Process-local store with the same contract as PgEventStore: append-only
 * streams, optimistic concurrency checked on append and again at commit
 * (standing in for the `(stream_id, sequence_number)` primary key).
 */
export class InMemoryEventStore implements EventStore<InMemoryTx> {
  private streams = new Map<StreamId, PersistedEvent[]>();
  private snapshotsByStream = new Map<StreamId, StoredSnapshot[]>();

  async withTx<T>(fn: (tx: InMemoryTx) => Promise<T>): Promise<T> {
    const tx = new InMemoryTx();
    const result = await fn(tx);
    this.commit(tx);
    return result;
  }

  private commit(tx: InMemoryTx): void {
    for (const [streamId, base] of tx.baseVersions) {
      const current = lastVersion(this.streams.get(streamId) ?? []);
      if (current !== base) {
        throw new ConcurrencyError(
          `version conflict (unique violation): stream=${streamId} expected=${base} current=${current}`,
          streamId,
          base
        );
      }
    }

    for (const [streamId, staged] of tx.staged) {
      const list = this.streams.get(streamId) ?? [];
      this.streams.set(streamId, [...list, ...staged]);
    }
    for (const snap of tx.snapshots) {
      const list = this.snapshotsByStream.get(snap.stream_id) ?? [];
      list.push(snap);
      this.snapshotsByStream.set(snap.stream_id, list);
    }
  }

  private visible(tx: InMemoryTx, streamId: StreamId): PersistedEvent[] {
    return [...(this.streams.get(streamId) ?? []), ...(tx.staged.get(streamId) ?? [])];
  }

  async loadEvents(tx: InMemoryTx, streamId: StreamId, afterVersion = 0): Promise<PersistedEvent[]> {
    return this.visible(tx, streamId)
      .filter((e) => e.sequence_number > afterVersion)
      .map((e) => ({ ...e }));
  }

  async appendEvents(
    tx: InMemoryTx,
    streamId: StreamId,
    expectedVersion: number,
    events: readonly Tagged[],
    final: readonly boolean[] = []
  ): Promise<PersistedEvent[]> {
    if (events.length === 0) return [];

    const visible = this.visible(tx, streamId);
    const currentVersion = lastVersion(visible);
    if (currentVersion !== expectedVersion) {
      throw new ConcurrencyError(
        `version conflict: stream=${streamId} expected=${expectedVersion} current=${currentVersion}`,
        streamId,
        expectedVersion
      );
    }
    assertAppendable(streamId, visible.some((e) => e.final), events.length, final);

    if (!tx.baseVersions.has(streamId)) {
      tx.baseVersions.set(streamId, lastVersion(this.streams.get(streamId) ?? []));
    }

    const now = new Date();
    const inserted = events.map((e, i): PersistedEvent => {
      const { event_type, payload } = toRecord(e);
      return {
        stream_id: streamId,
        sequence_number: expectedVersion + i + 1,
        event_type,
        payload: JSON.parse(JSON.stringify(payload)),
        final: final[i] ?? false,
        occurred_at: now,
      };
    });

    tx.staged.set(streamId, [...(tx.staged.get(streamId) ?? []), ...inserted]);
    return inserted.map((e) => ({ ...e }));
  }

  async saveSnapshot(tx: InMemoryTx, snapshot: StoredSnapshot): Promise<void> {
    tx.snapshots.push({ ...snapshot, state: JSON.parse(JSON.stringify(snapshot.state)) });
  }

  async getLatestSnapshot(tx: InMemoryTx, streamId: StreamId): Promise<StoredSnapshot | null> {
    const candidates = [
      ...(this.snapshotsByStream.get(streamId) ?? []),
      ...tx.snapshots.filter((s) => s.stream_id === streamId),
    ];
    if (candidates.length === 0) return null;

    return candidates.reduce((latest, s) => (s.version > latest.version ? s : latest));
  }

  /** Committed version of a stream; test helper. */
  streamVersion(streamId: StreamId): number {
    return lastVersion(this.streams.get(streamId) ?? []);
  }
}
