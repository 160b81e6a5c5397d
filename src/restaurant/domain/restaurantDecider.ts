import { Decider, accept, reject } from "../../es/domain/decider";
import type { RestaurantCommand, RestaurantEvent, RestaurantState } from "./types";

export const restaurantDecider: Decider<RestaurantCommand, RestaurantState, RestaurantEvent> = {
  commandTypes: ["CreateRestaurant", "ChangeRestaurantMenu", "PlaceOrder"],
  eventTypes: ["RestaurantCreated", "RestaurantMenuChanged", "OrderPlaced"],
  initialState: null,

  decide(command, state) {
    switch (command.type) {
      case "CreateRestaurant": {
        if (state) {
          return reject(
            "RESTAURANT_ALREADY_EXISTS",
            `Failed to create the restaurant ${command.identifier}: already created`
          );
        }
        return accept<RestaurantEvent>({
          type: "RestaurantCreated",
          identifier: command.identifier,
          name: command.name,
          menu: command.menu,
        });
      }

      case "ChangeRestaurantMenu": {
        if (!state) {
          return reject(
            "RESTAURANT_NOT_FOUND",
            `Failed to change the menu: restaurant ${command.identifier} does not exist`
          );
        }
        return accept<RestaurantEvent>({
          type: "RestaurantMenuChanged",
          identifier: command.identifier,
          menu: command.menu,
        });
      }

      case "PlaceOrder": {
        if (!state) {
          return reject(
            "RESTAURANT_NOT_FOUND",
            `Failed to place the order: restaurant ${command.identifier} does not exist`
          );
        }
        if (state.orders[command.order_identifier]) {
          return reject(
            "ORDER_ALREADY_PLACED",
            `Failed to place the order: ${command.order_identifier} was already placed`
          );
        }
        const onMenu = new Set(state.menu.items.map((i) => i.id));
        const missing = command.line_items.filter((li) => !onMenu.has(li.menu_item_id));
        if (missing.length > 0) {
          return reject(
            "MENU_ITEM_NOT_AVAILABLE",
            `Failed to place the order: not on the menu: ${missing.map((li) => li.menu_item_id).join(", ")}`
          );
        }
        return accept<RestaurantEvent>({
          type: "OrderPlaced",
          identifier: command.identifier,
          order_identifier: command.order_identifier,
          line_items: command.line_items,
        });
      }
    }
  },

  evolve(state, event) {
    switch (event.type) {
      case "RestaurantCreated":
        return {
          identifier: event.identifier,
          name: event.name,
          menu: event.menu,
          orders: {},
        };

      case "RestaurantMenuChanged":
        return state ? { ...state, menu: event.menu } : state;

      case "OrderPlaced":
        return state
          ? {
              ...state,
              orders: {
                ...state.orders,
                [event.order_identifier]: {
                  order_identifier: event.order_identifier,
                  line_items: event.line_items,
                },
              },
            }
          : state;

      default:
        return state;
    }
  },
};
