import { Decider, Decision, Tagged, reject } from "./decider";
import { DeciderConfigurationError } from "./errors";

export const COMMAND_NOT_RECOGNIZED = "COMMAND_NOT_RECOGNIZED";

function assertDisjoint(kind: string, left: readonly string[], right: readonly string[]): void {
  const seen = new Set(left);
  const clashes = right.filter((t) => seen.has(t));
  if (clashes.length > 0) {
    throw new DeciderConfigurationError(
      `${kind} types claimed by more than one decider: ${clashes.join(", ")}`
    );
  }
}

/**
 * Merges two deciders over disjoint command/event tags.
 *
 * State is the ordered pair of component states. Commands and events are
 * dispatched on their `type` tag, never on position, so nesting
 * `combine(combine(a, b), c)` routes exactly like `combine(a, combine(b, c))`.
 */
export function combine<
  C1 extends Tagged,
  S1,
  E1 extends Tagged,
  C2 extends Tagged,
  S2,
  E2 extends Tagged,
>(
  left: Decider<C1, S1, E1>,
  right: Decider<C2, S2, E2>
): Decider<C1 | C2, readonly [S1, S2], E1 | E2> {
  assertDisjoint("command", left.commandTypes, right.commandTypes);
  assertDisjoint("event", left.eventTypes, right.eventTypes);

  const leftCommands = new Set<string>(left.commandTypes);
  const rightCommands = new Set<string>(right.commandTypes);
  const leftEvents = new Set<string>(left.eventTypes);
  const rightEvents = new Set<string>(right.eventTypes);

  const isLeftCommand = (c: C1 | C2): c is C1 => leftCommands.has(c.type);
  const isRightCommand = (c: C1 | C2): c is C2 => rightCommands.has(c.type);
  const isLeftEvent = (e: E1 | E2): e is E1 => leftEvents.has(e.type);
  const isRightEvent = (e: E1 | E2): e is E2 => rightEvents.has(e.type);

  const commandTypes: (C1 | C2)["type"][] = [...left.commandTypes, ...right.commandTypes];
  const eventTypes: (E1 | E2)["type"][] = [...left.eventTypes, ...right.eventTypes];

  return {
    commandTypes,
    eventTypes,
    initialState: [left.initialState, right.initialState],

    decide(command, state): Decision<E1 | E2> {
      const tag: string = command.type;
      if (isLeftCommand(command)) return left.decide(command, state[0]);
      if (isRightCommand(command)) return right.decide(command, state[1]);
      return reject(COMMAND_NOT_RECOGNIZED, `command not recognized by any decider: ${tag}`);
    },

    evolve(state, event) {
      if (isLeftEvent(event)) {
        const next = left.evolve(state[0], event);
        return next === state[0] ? state : [next, state[1]];
      }
      if (isRightEvent(event)) {
        const next = right.evolve(state[1], event);
        return next === state[1] ? state : [state[0], next];
      }
      return state;
    },
  };
}
