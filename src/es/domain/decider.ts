/** Anything routed by its `type` discriminant: commands and events alike. */
export interface Tagged {
  readonly type: string;
}

export type Decision<E> =
  | { ok: true; events: readonly E[] }
  | { ok: false; code: string; message: string };

/**
 * Pure description of one aggregate's behaviour.
 *
 * `commandTypes` and `eventTypes` list the tags the decider owns; the
 * combinator routes on them, so they must match what `decide` accepts and
 * `evolve` understands.
 *
 * `evolve` must return `state` untouched for tags it does not know.
 */
export interface Decider<C extends Tagged, S, E extends Tagged> {
  readonly commandTypes: readonly C["type"][];
  readonly eventTypes: readonly E["type"][];
  readonly initialState: S;
  decide(command: C, state: S): Decision<E>;
  evolve(state: S, event: E): S;
}

export function accept<E>(...events: E[]): Decision<E> {
  return { ok: true, events };
}

export function reject<E = never>(code: string, message: string): Decision<E> {
  return { ok: false, code, message };
}

export function fold<C extends Tagged, S, E extends Tagged>(
  decider: Decider<C, S, E>,
  events: readonly E[],
  from: S = decider.initialState
): S {
  let current = from;
  for (const ev of events) {
    current = decider.evolve(current, ev);
  }
  return current;
}

/** Replays `history` and decides `command` against the result. */
export function computeNewEvents<C extends Tagged, S, E extends Tagged>(
  decider: Decider<C, S, E>,
  history: readonly E[],
  command: C
): Decision<E> {
  return decider.decide(command, fold(decider, history));
}
