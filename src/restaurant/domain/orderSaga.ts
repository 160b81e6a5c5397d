import type { Saga } from "../../es/domain/saga";
import type { OrderCommand, RestaurantEvent } from "./types";

/** A placed order opens its own order stream. */
export const orderSaga: Saga<RestaurantEvent, OrderCommand> = {
  actionResultTypes: ["OrderPlaced"],

  react(event) {
    if (event.type !== "OrderPlaced") return [];
    return [
      {
        type: "CreateOrder",
        identifier: event.order_identifier,
        restaurant_identifier: event.identifier,
        line_items: event.line_items,
      },
    ];
  },
};
