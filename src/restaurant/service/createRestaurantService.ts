import type { Logger } from "pino";
import type { EventStore } from "../../es/db/eventStore";
import { EventSourcedAggregate } from "../../es/service/aggregate";
import { CommandHandler } from "../../es/service/commandHandler";
import { env } from "../../config/env";
import { commandCodec, decodeEvent, decodeState } from "../domain/codec";
import { isFinal, orderRestaurantDecider, orderRestaurantSaga, streamIdOf } from "../domain";
import type { Command, Event, OrderAndRestaurantState } from "../domain/types";

export type RestaurantAggregate<Tx> = EventSourcedAggregate<Command, OrderAndRestaurantState, Event, Tx>;
export type RestaurantCommandHandler<Tx> = CommandHandler<Command, OrderAndRestaurantState, Event, Tx>;

/** Read/write surface the HTTP routes depend on. */
export interface RestaurantService {
  handler: Pick<RestaurantCommandHandler<unknown>, "handle" | "handleAll">;
  aggregate: Pick<RestaurantAggregate<unknown>, "getState" | "getEvents">;
}

export function createRestaurantService<Tx>(
  store: EventStore<Tx>,
  options?: { snapshotEvery?: number; withSaga?: boolean; log?: Logger }
): { handler: RestaurantCommandHandler<Tx>; aggregate: RestaurantAggregate<Tx> } {
  const aggregate: RestaurantAggregate<Tx> = new EventSourcedAggregate(store, {
    decider: orderRestaurantDecider,
    decodeEvent,
    decodeState,
    streamIdOf,
    isFinal,
    saga: options?.withSaga === false ? undefined : orderRestaurantSaga,
    snapshotEvery: options?.snapshotEvery ?? env.SNAPSHOT_EVERY,
    log: options?.log,
  });
  const handler: RestaurantCommandHandler<Tx> = new CommandHandler(aggregate, commandCodec, options?.log);
  return { handler, aggregate };
}
