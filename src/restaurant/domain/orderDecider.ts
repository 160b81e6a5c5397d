import { Decider, accept, reject } from "../../es/domain/decider";
import type { OrderCommand, OrderEvent, OrderState } from "./types";

export const orderDecider: Decider<OrderCommand, OrderState, OrderEvent> = {
  commandTypes: ["CreateOrder", "MarkOrderAsPrepared"],
  eventTypes: ["OrderCreated", "OrderPrepared"],
  initialState: null,

  decide(command, state) {
    switch (command.type) {
      case "CreateOrder": {
        if (state) {
          return reject(
            "ORDER_ALREADY_EXISTS",
            `Failed to create the order ${command.identifier}: already exists`
          );
        }
        return accept<OrderEvent>({
          type: "OrderCreated",
          identifier: command.identifier,
          restaurant_identifier: command.restaurant_identifier,
          status: "CREATED",
          line_items: command.line_items,
        });
      }

      case "MarkOrderAsPrepared": {
        if (state?.status !== "CREATED") {
          return reject(
            "ORDER_NOT_PREPARABLE",
            `Failed to mark the order ${command.identifier} as prepared: status is ${state?.status ?? "absent"}`
          );
        }
        return accept<OrderEvent>({
          type: "OrderPrepared",
          identifier: command.identifier,
          status: "PREPARED",
        });
      }
    }
  },

  evolve(state, event) {
    switch (event.type) {
      case "OrderCreated":
        return {
          identifier: event.identifier,
          restaurant_identifier: event.restaurant_identifier,
          status: event.status,
          line_items: event.line_items,
        };

      case "OrderPrepared":
        return state ? { ...state, status: event.status } : state;

      default:
        return state;
    }
  },
};
