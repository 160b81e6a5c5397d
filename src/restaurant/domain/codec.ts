import { z } from "zod";
import { DecodingError, StorageFailureError } from "../../es/domain/errors";
import type { PersistedEvent } from "../../es/db/eventStore";
import type { CommandCodec } from "../../es/service/commandHandler";
import {
  CUISINES,
  Command,
  Event,
  MenuItem,
  Order,
  OrderAndRestaurantState,
  OrderLineItem,
  Restaurant,
  RestaurantMenu,
} from "./types";

const id = z.string().trim().min(1);

const MenuItemSchema: z.ZodType<MenuItem> = z.object({
  id,
  name: z.string().min(1),
  price: z.number().int().nonnegative(),
});

const MenuSchema: z.ZodType<RestaurantMenu> = z.object({
  menu_id: id,
  cuisine: z.enum(CUISINES),
  items: z.array(MenuItemSchema),
});

const LineItemSchema: z.ZodType<OrderLineItem> = z.object({
  id,
  quantity: z.number().int().positive(),
  menu_item_id: id,
  name: z.string().min(1),
});

export const CommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("CreateRestaurant"), identifier: id, name: z.string().min(1), menu: MenuSchema }),
  z.object({ type: z.literal("ChangeRestaurantMenu"), identifier: id, menu: MenuSchema }),
  z.object({
    type: z.literal("PlaceOrder"),
    identifier: id,
    order_identifier: id,
    line_items: z.array(LineItemSchema).min(1),
  }),
  z.object({
    type: z.literal("CreateOrder"),
    identifier: id,
    restaurant_identifier: id,
    line_items: z.array(LineItemSchema).min(1),
  }),
  z.object({ type: z.literal("MarkOrderAsPrepared"), identifier: id }),
]);

export const EventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("RestaurantCreated"), identifier: id, name: z.string(), menu: MenuSchema }),
  z.object({ type: z.literal("RestaurantMenuChanged"), identifier: id, menu: MenuSchema }),
  z.object({
    type: z.literal("OrderPlaced"),
    identifier: id,
    order_identifier: id,
    line_items: z.array(LineItemSchema),
  }),
  z.object({
    type: z.literal("OrderCreated"),
    identifier: id,
    restaurant_identifier: id,
    status: z.literal("CREATED"),
    line_items: z.array(LineItemSchema),
  }),
  z.object({ type: z.literal("OrderPrepared"), identifier: id, status: z.literal("PREPARED") }),
]);

const RestaurantSchema: z.ZodType<Restaurant> = z.object({
  identifier: id,
  name: z.string(),
  menu: MenuSchema,
  orders: z.record(
    z.string(),
    z.object({ order_identifier: id, line_items: z.array(LineItemSchema) })
  ),
});

const OrderSchema: z.ZodType<Order> = z.object({
  identifier: id,
  restaurant_identifier: id,
  status: z.enum(["CREATED", "PREPARED"]),
  line_items: z.array(LineItemSchema),
});

export const StateSchema: z.ZodType<OrderAndRestaurantState> = z.tuple([
  RestaurantSchema.nullable(),
  OrderSchema.nullable(),
]);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export const commandCodec: CommandCodec<Command> = {
  decode(payload) {
    const parsed = CommandSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DecodingError(`invalid command: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  },
};

export function decodeEvent(record: PersistedEvent): Event {
  const parsed = EventSchema.safeParse(record.payload);
  if (!parsed.success || parsed.data.type !== record.event_type) {
    throw new StorageFailureError(
      `undecodable event ${record.event_type} at ${record.stream_id}#${record.sequence_number}`
    );
  }
  return parsed.data;
}

export function decodeState(raw: unknown): OrderAndRestaurantState {
  const parsed = StateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageFailureError(`undecodable snapshot: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
