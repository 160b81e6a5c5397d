import type { Logger } from "pino";
import type { Tagged } from "../domain/decider";
import { DecodingError, DomainError, EsError } from "../domain/errors";
import type { PersistedEvent, StreamId } from "../db/eventStore";
import type { EventSourcedAggregate, HandleResult } from "./aggregate";

export interface CommandCodec<C> {
  /** Throws DecodingError for malformed payloads or unknown `type` tags. */
  decode(payload: unknown): C;
}

export type EncodedEvent = {
  sequence_number: number;
  type: string;
  payload: unknown;
  final: boolean;
  occurred_at: string;
};

export type StreamOutcome = {
  stream_id: StreamId;
  version: number;
  events: EncodedEvent[];
};

export type CommandSuccess<S> = StreamOutcome & {
  ok: true;
  state: S;
  /** Streams written by saga follow-ups, in the order they were handled. */
  reactions: StreamOutcome[];
};

export type CommandFailure = {
  ok: false;
  code: string;
  message: string;
  retryable: boolean;
  statusCode: number;
  reason?: string;
};

export type CommandOutcome<S> = CommandSuccess<S> | CommandFailure;

export type BatchOutcome<S> =
  | { ok: true; results: CommandSuccess<S>[] }
  | CommandFailure;

export function encodeEvent(e: PersistedEvent): EncodedEvent {
  return {
    sequence_number: e.sequence_number,
    type: e.event_type,
    payload: e.payload,
    final: e.final,
    occurred_at: e.occurred_at.toISOString(),
  };
}

function flattenReactions<S>(result: HandleResult<S>): StreamOutcome[] {
  return result.reactions.flatMap((r) => [
    { stream_id: r.stream_id, version: r.version, events: r.events.map(encodeEvent) },
    ...flattenReactions(r),
  ]);
}

function encodeResult<S>(result: HandleResult<S>): CommandSuccess<S> {
  return {
    ok: true,
    stream_id: result.stream_id,
    version: result.version,
    events: result.events.map(encodeEvent),
    state: result.state,
    reactions: flattenReactions(result),
  };
}

export function toFailure(err: EsError): CommandFailure {
  return {
    ok: false,
    code: err.code,
    message: err.message,
    retryable: err.retryable,
    statusCode: err.statusCode,
    ...(err instanceof DomainError ? { reason: err.reason } : {}),
  };
}

/**
 * Boundary function: payload in, structured outcome out.
 *
 * Core errors (decoding, domain, conflict, storage) become failure outcomes.
 * Anything else is a fault and is rethrown.
 */
export class CommandHandler<C extends Tagged, S, E extends Tagged, Tx> {
  private log?: Logger;

  constructor(
    private aggregate: EventSourcedAggregate<C, S, E, Tx>,
    private codec: CommandCodec<C>,
    log?: Logger
  ) {
    this.log = log?.child({ component: "command-handler" });
  }

  async handle(payload: unknown): Promise<CommandOutcome<S>> {
    try {
      const command = this.codec.decode(payload);
      const streamId = this.aggregate.streamIdOf(command);
      const result = await this.aggregate.handle(streamId, command);
      this.log?.info(
        { streamId, command: command.type, version: result.version, appended: result.events.length },
        "command handled"
      );
      return encodeResult(result);
    } catch (err) {
      return this.fail(err);
    }
  }

  async handleAll(payloads: unknown): Promise<BatchOutcome<S>> {
    try {
      if (!Array.isArray(payloads) || payloads.length === 0) {
        throw new DecodingError("commands must be a non-empty array");
      }
      const commands = payloads.map((p, i) => {
        try {
          return this.codec.decode(p);
        } catch (err) {
          if (err instanceof DecodingError) {
            throw new DecodingError(`commands[${i}]: ${err.message}`);
          }
          throw err;
        }
      });
      const results = await this.aggregate.handleAll(commands);
      this.log?.info({ count: results.length }, "command batch handled");
      return { ok: true, results: results.map(encodeResult) };
    } catch (err) {
      return this.fail(err);
    }
  }

  private fail(err: unknown): CommandFailure {
    if (!(err instanceof EsError)) throw err;
    if (err.code === "STORAGE_FAILURE") {
      this.log?.error({ err }, "storage failure");
    }
    return toFailure(err);
  }
}
