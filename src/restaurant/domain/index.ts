import { combine } from "../../es/domain/combine";
import type { Saga } from "../../es/domain/saga";
import { orderDecider } from "./orderDecider";
import { orderSaga } from "./orderSaga";
import { restaurantDecider } from "./restaurantDecider";
import type { Command, Event } from "./types";

/** One decider for the whole bounded context: state is [restaurant, order]. */
export const orderRestaurantDecider = combine(restaurantDecider, orderDecider);

export const orderRestaurantSaga: Saga<Event, Command> = orderSaga;

export const restaurantStream = (identifier: string): string => `restaurant-${identifier}`;
export const orderStream = (identifier: string): string => `order-${identifier}`;

/**
 * Every command carries its target aggregate in `identifier`; the stream is
 * keyed by aggregate kind as well, so a restaurant and an order may share one.
 */
export function streamIdOf(command: Command): string {
  switch (command.type) {
    case "CreateRestaurant":
    case "ChangeRestaurantMenu":
    case "PlaceOrder":
      return restaurantStream(command.identifier);
    case "CreateOrder":
    case "MarkOrderAsPrepared":
      return orderStream(command.identifier);
  }
}

/** OrderPrepared ends the order's lifecycle. */
export function isFinal(event: Event): boolean {
  return event.type === "OrderPrepared";
}

export { restaurantDecider, orderDecider, orderSaga };
