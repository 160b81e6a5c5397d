export type RestaurantId = string;
export type OrderId = string;
export type MenuId = string;
export type MenuItemId = string;

export const CUISINES = [
  "ITALIAN",
  "INDIAN",
  "CHINESE",
  "JAPANESE",
  "AMERICAN",
  "MEXICAN",
  "FRENCH",
  "THAI",
  "VIETNAMESE",
  "GREEK",
  "KOREAN",
  "SPANISH",
  "LEBANESE",
  "TURKISH",
  "ETHIOPIAN",
  "MOROCCAN",
  "EGYPTIAN",
  "BRAZILIAN",
  "POLISH",
  "GERMAN",
  "BRITISH",
  "IRISH",
  "OTHER",
] as const;

export type Cuisine = (typeof CUISINES)[number];

export interface MenuItem {
  id: MenuItemId;
  name: string;
  price: number; // minor units
}

export interface RestaurantMenu {
  menu_id: MenuId;
  cuisine: Cuisine;
  items: MenuItem[];
}

export interface OrderLineItem {
  id: string;
  quantity: number;
  menu_item_id: MenuItemId;
  name: string;
}

export type OrderStatus = "CREATED" | "PREPARED";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface CreateRestaurant {
  type: "CreateRestaurant";
  identifier: RestaurantId;
  name: string;
  menu: RestaurantMenu;
}

export interface ChangeRestaurantMenu {
  type: "ChangeRestaurantMenu";
  identifier: RestaurantId;
  menu: RestaurantMenu;
}

export interface PlaceOrder {
  type: "PlaceOrder";
  identifier: RestaurantId;
  order_identifier: OrderId;
  line_items: OrderLineItem[];
}

export interface CreateOrder {
  type: "CreateOrder";
  identifier: OrderId;
  restaurant_identifier: RestaurantId;
  line_items: OrderLineItem[];
}

export interface MarkOrderAsPrepared {
  type: "MarkOrderAsPrepared";
  identifier: OrderId;
}

export type RestaurantCommand = CreateRestaurant | ChangeRestaurantMenu | PlaceOrder;
export type OrderCommand = CreateOrder | MarkOrderAsPrepared;
export type Command = RestaurantCommand | OrderCommand;

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface RestaurantCreated {
  type: "RestaurantCreated";
  identifier: RestaurantId;
  name: string;
  menu: RestaurantMenu;
}

export interface RestaurantMenuChanged {
  type: "RestaurantMenuChanged";
  identifier: RestaurantId;
  menu: RestaurantMenu;
}

export interface OrderPlaced {
  type: "OrderPlaced";
  identifier: RestaurantId;
  order_identifier: OrderId;
  line_items: OrderLineItem[];
}

export interface OrderCreated {
  type: "OrderCreated";
  identifier: OrderId;
  restaurant_identifier: RestaurantId;
  status: "CREATED";
  line_items: OrderLineItem[];
}

export interface OrderPrepared {
  type: "OrderPrepared";
  identifier: OrderId;
  status: "PREPARED";
}

export type RestaurantEvent = RestaurantCreated | RestaurantMenuChanged | OrderPlaced;
export type OrderEvent = OrderCreated | OrderPrepared;
export type Event = RestaurantEvent | OrderEvent;

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface PlacedOrder {
  order_identifier: OrderId;
  line_items: OrderLineItem[];
}

export interface Restaurant {
  identifier: RestaurantId;
  name: string;
  menu: RestaurantMenu;
  /** Orders placed at this restaurant, keyed by order id. */
  orders: Record<OrderId, PlacedOrder>;
}

export interface Order {
  identifier: OrderId;
  restaurant_identifier: RestaurantId;
  status: OrderStatus;
  line_items: OrderLineItem[];
}

/** `null` until the aggregate's creation event. */
export type RestaurantState = Restaurant | null;
export type OrderState = Order | null;
export type OrderAndRestaurantState = readonly [RestaurantState, OrderState];
