import { DatabaseError, Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import type { Logger } from "pino";
import type { Tagged } from "../domain/decider";
import { ConcurrencyError, EsError, StorageFailureError } from "../domain/errors";
import {
  EventStore,
  PersistedEvent,
  StoredSnapshot,
  StreamId,
  assertAppendable,
  toRecord,
} from "./eventStore";

const UNIQUE_VIOLATION = "23505";

type EventRow = {
  stream_id: string;
  sequence_number: number | string;
  event_type: string;
  payload: unknown;
  final: boolean;
  occurred_at: Date;
};

type SnapshotRow = {
  stream_id: string;
  version: number | string;
  state: unknown;
  created_at: Date;
};

function toPersisted(row: EventRow): PersistedEvent {
  return {
    stream_id: row.stream_id,
    sequence_number: Number(row.sequence_number),
    event_type: row.event_type,
    payload: row.payload,
    final: row.final,
    occurred_at: row.occurred_at,
  };
}

/** Lost connection: the client must not go back to the pool. */
function isConnectionFailure(err: unknown): boolean {
  return err instanceof StorageFailureError && err.cause instanceof Error && !(err.cause instanceof DatabaseError);
}

/**
 * Runs one statement. SQLSTATE errors pass through for the caller to map;
 * anything else (dropped socket, terminated backend) is a storage failure.
 */
async function query<R extends QueryResultRow>(
  client: PoolClient,
  text: string,
  values?: unknown[]
): Promise<QueryResult<R>> {
  try {
    return await client.query<R>(text, values);
  } catch (err) {
    if (err instanceof DatabaseError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new StorageFailureError(`database connection failed: ${reason}`, err);
  }
}

export class PgEventStore implements EventStore<PoolClient> {
  constructor(private pool: Pool, private log?: Logger) {}

  async withTx<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StorageFailureError("could not acquire a database connection", err);
    }

    let broken = false;
    try {
      await query(client, "BEGIN");
      const result = await fn(client);
      await query(client, "COMMIT");
      return result;
    } catch (err) {
      broken = isConnectionFailure(err);
      if (!broken) {
        await query(client, "ROLLBACK").catch((rollbackErr: unknown) => {
          broken = true;
          this.log?.error({ err: rollbackErr }, "rollback failed");
        });
      }
      if (err instanceof EsError) throw err;
      if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) {
        // deferred uniqueness check fired at COMMIT
        throw new ConcurrencyError(`version conflict (unique violation): ${err.detail ?? err.message}`);
      }
      if (err instanceof DatabaseError) {
        throw new StorageFailureError(`database error: ${err.message}`, err);
      }
      throw err;
    } finally {
      client.release(broken);
    }
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  async currentVersion(client: PoolClient, streamId: StreamId): Promise<number> {
    return (await this.streamHead(client, streamId)).version;
  }

  private async streamHead(client: PoolClient, streamId: StreamId): Promise<{ version: number; closed: boolean }> {
    const r = await query<{ v: number | string; closed: boolean }>(
      client,
      `SELECT COALESCE(MAX(sequence_number), 0) AS v, COALESCE(BOOL_OR(final), false) AS closed
       FROM events
       WHERE stream_id = $1`,
      [streamId]
    );
    const row = r.rows[0];
    return { version: Number(row?.v ?? 0), closed: row?.closed ?? false };
  }

  async appendEvents(
    client: PoolClient,
    streamId: StreamId,
    expectedVersion: number,
    events: readonly Tagged[],
    final: readonly boolean[] = []
  ): Promise<PersistedEvent[]> {
    if (events.length === 0) return [];

    const head = await this.streamHead(client, streamId);
    if (head.version !== expectedVersion) {
      throw new ConcurrencyError(
        `version conflict: stream=${streamId} expected=${expectedVersion} current=${head.version}`,
        streamId,
        expectedVersion
      );
    }
    assertAppendable(streamId, head.closed, events.length, final);

    const inserted: PersistedEvent[] = [];

    try {
      for (let i = 0; i < events.length; i++) {
        const { event_type, payload } = toRecord(events[i]);
        const ins = await query<EventRow>(
          client,
          `INSERT INTO events (stream_id, sequence_number, event_type, payload, final)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING stream_id, sequence_number, event_type, payload, final, occurred_at`,
          [streamId, expectedVersion + i + 1, event_type, JSON.stringify(payload), final[i] ?? false]
        );
        inserted.push(toPersisted(ins.rows[0]));
      }
    } catch (err) {
      // unique violation (stream_id, sequence_number): a concurrent writer won
      if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) {
        throw new ConcurrencyError(
          `version conflict (unique violation): stream=${streamId} expected=${expectedVersion}`,
          streamId,
          expectedVersion
        );
      }
      throw err;
    }

    this.log?.debug({ streamId, from: expectedVersion + 1, count: inserted.length }, "events appended");
    return inserted;
  }

  async loadEvents(client: PoolClient, streamId: StreamId, afterVersion = 0): Promise<PersistedEvent[]> {
    const r = await query<EventRow>(
      client,
      `SELECT stream_id, sequence_number, event_type, payload, final, occurred_at
       FROM events
       WHERE stream_id = $1 AND sequence_number > $2
       ORDER BY sequence_number ASC`,
      [streamId, afterVersion]
    );
    return r.rows.map(toPersisted);
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  async saveSnapshot(client: PoolClient, snapshot: StoredSnapshot): Promise<void> {
    await query(
      client,
      `INSERT INTO snapshots (stream_id, version, state)
       VALUES ($1, $2, $3)
       ON CONFLICT (stream_id, version) DO NOTHING`,
      [snapshot.stream_id, snapshot.version, JSON.stringify(snapshot.state)]
    );
  }

  async getLatestSnapshot(client: PoolClient, streamId: StreamId): Promise<StoredSnapshot | null> {
    const r = await query<SnapshotRow>(
      client,
      `SELECT stream_id, version, state, created_at
       FROM snapshots
       WHERE stream_id = $1
       ORDER BY version DESC
       LIMIT 1`,
      [streamId]
    );

    const row = r.rows[0];
    if (!row) return null;
    return {
      stream_id: row.stream_id,
      version: Number(row.version),
      state: row.state,
      created_at: row.created_at,
    };
  }
}
