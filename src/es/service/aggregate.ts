import type { Logger } from "pino";
import { Decider, Tagged, fold } from "../domain/decider";
import { ConcurrencyError, DomainError } from "../domain/errors";
import type { Saga } from "../domain/saga";
import { shouldTakeSnapshot } from "../domain/snapshot";
import type { EventStore, PersistedEvent, StreamId } from "../db/eventStore";

export const MAX_SAGA_DEPTH = 10;

export interface AggregateOptions<C extends Tagged, S, E extends Tagged> {
  decider: Decider<C, S, E>;
  /** Turns a stored row back into a domain event. Throws on rows it cannot read. */
  decodeEvent: (record: PersistedEvent) => E;
  /** Stream a command targets; used for saga follow-ups and batches. */
  streamIdOf: (command: C) => StreamId;
  saga?: Saga<E, C>;
  /** Marks events that close their stream. Later appends fail with STREAM_CLOSED. */
  isFinal?: (event: E) => boolean;
  /** Validates a stored snapshot. Snapshots stay off without it. */
  decodeState?: (raw: unknown) => S;
  snapshotEvery?: number;
  log?: Logger;
}

export type LoadedState<S> = {
  stream_id: StreamId;
  version: number;
  state: S;
};

export type HandleResult<S> = LoadedState<S> & {
  events: PersistedEvent[];
  /** Results of commands a saga issued in reaction to `events`. */
  reactions: HandleResult<S>[];
};

/**
 * Event-sourced command handling over one EventStore.
 *
 * Every public call is a single transaction: load, fold, decide, append.
 * A rejected decision throws DomainError before anything is written; a stale
 * version throws ConcurrencyError and the transaction rolls back.
 */
export class EventSourcedAggregate<C extends Tagged, S, E extends Tagged, Tx> {
  private log?: Logger;

  constructor(
    private store: EventStore<Tx>,
    private options: AggregateOptions<C, S, E>
  ) {
    this.log = options.log?.child({ component: "aggregate" });
  }

  private get snapshotsEnabled(): boolean {
    return this.options.decodeState != null && (this.options.snapshotEvery ?? 0) > 0;
  }

  streamIdOf(command: C): StreamId {
    return this.options.streamIdOf(command);
  }

  async handle(streamId: StreamId, command: C): Promise<HandleResult<S>> {
    return this.store.withTx((tx) => this.handleInTx(tx, streamId, command, 0));
  }

  /**
   * Handles `commands` in order inside one transaction. Later commands see
   * the events of earlier ones; any failure discards the whole batch.
   */
  async handleAll(commands: readonly C[]): Promise<HandleResult<S>[]> {
    return this.store.withTx(async (tx) => {
      const results: HandleResult<S>[] = [];
      for (const command of commands) {
        results.push(await this.handleInTx(tx, this.options.streamIdOf(command), command, 0));
      }
      return results;
    });
  }

  async getState(streamId: StreamId): Promise<LoadedState<S>> {
    return this.store.withTx((tx) => this.load(tx, streamId));
  }

  async getEvents(streamId: StreamId, from?: number, to?: number): Promise<PersistedEvent[]> {
    return this.store.withTx(async (tx) => {
      const rows = await this.store.loadEvents(tx, streamId, from != null ? from - 1 : 0);
      return to != null ? rows.filter((r) => r.sequence_number <= to) : rows;
    });
  }

  private async load(tx: Tx, streamId: StreamId): Promise<LoadedState<S>> {
    const { decider, decodeEvent, decodeState } = this.options;

    let base = decider.initialState;
    let baseVersion = 0;

    if (this.snapshotsEnabled && decodeState) {
      const snap = await this.store.getLatestSnapshot(tx, streamId);
      if (snap) {
        base = decodeState(snap.state);
        baseVersion = snap.version;
      }
    }

    const rows = await this.store.loadEvents(tx, streamId, baseVersion);
    const state = fold(decider, rows.map(decodeEvent), base);
    const version = rows.length > 0 ? rows[rows.length - 1].sequence_number : baseVersion;

    return { stream_id: streamId, version, state };
  }

  private async handleInTx(tx: Tx, streamId: StreamId, command: C, depth: number): Promise<HandleResult<S>> {
    const { decider, saga, isFinal } = this.options;

    const { state, version } = await this.load(tx, streamId);

    const decision = decider.decide(command, state);
    if (!decision.ok) {
      this.log?.info({ streamId, command: command.type, reason: decision.code }, "command rejected");
      throw new DomainError(decision.message, decision.code);
    }

    let persisted: PersistedEvent[];
    try {
      const final = decision.events.map((ev) => isFinal?.(ev) ?? false);
      persisted = await this.store.appendEvents(tx, streamId, version, decision.events, final);
    } catch (err) {
      if (err instanceof ConcurrencyError) {
        this.log?.warn({ streamId, expectedVersion: version, command: command.type }, "append conflict");
      }
      throw err;
    }

    const nextState = fold(decider, decision.events, state);
    const nextVersion = persisted.length > 0 ? persisted[persisted.length - 1].sequence_number : version;

    if (this.snapshotsEnabled && shouldTakeSnapshot(version, nextVersion, this.options.snapshotEvery ?? 0)) {
      await this.store.saveSnapshot(tx, { stream_id: streamId, version: nextVersion, state: nextState });
      this.log?.debug({ streamId, version: nextVersion }, "snapshot saved");
    }

    const reactions: HandleResult<S>[] = [];
    if (saga) {
      const reactsTo = new Set<string>(saga.actionResultTypes);
      const followUps = decision.events.filter((ev) => reactsTo.has(ev.type)).flatMap((ev) => saga.react(ev));
      if (followUps.length > 0 && depth >= MAX_SAGA_DEPTH) {
        throw new DomainError(
          `saga reaction depth exceeded ${MAX_SAGA_DEPTH} at stream ${streamId}`,
          "SAGA_DEPTH_EXCEEDED"
        );
      }
      for (const next of followUps) {
        reactions.push(await this.handleInTx(tx, this.options.streamIdOf(next), next, depth + 1));
      }
    }

    return {
      stream_id: streamId,
      version: nextVersion,
      state: nextState,
      events: persisted,
      reactions,
    };
  }
}
