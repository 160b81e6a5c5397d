import type {
  ChangeRestaurantMenu,
  CreateRestaurant,
  MarkOrderAsPrepared,
  OrderLineItem,
  PlaceOrder,
  RestaurantMenu,
} from "../src/restaurant/domain/types";

export const MENU: RestaurantMenu = {
  menu_id: "M1",
  cuisine: "ITALIAN",
  items: [
    { id: "I1", name: "Margherita", price: 900 },
    { id: "I2", name: "Tiramisu", price: 550 },
  ],
};

export const LINE_ITEMS: OrderLineItem[] = [
  { id: "L1", quantity: 2, menu_item_id: "I1", name: "Margherita" },
];

export function createRestaurant(identifier = "R1", name = "Joe"): CreateRestaurant {
  return { type: "CreateRestaurant", identifier, name, menu: MENU };
}

export function changeMenu(identifier = "R1", menu: RestaurantMenu = MENU): ChangeRestaurantMenu {
  return { type: "ChangeRestaurantMenu", identifier, menu };
}

export function placeOrder(
  order_identifier = "O1",
  identifier = "R1",
  line_items: OrderLineItem[] = LINE_ITEMS
): PlaceOrder {
  return { type: "PlaceOrder", identifier, order_identifier, line_items };
}

export function markPrepared(identifier = "O1"): MarkOrderAsPrepared {
  return { type: "MarkOrderAsPrepared", identifier };
}
