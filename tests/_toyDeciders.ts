import type { PersistedEvent } from "../src/es/db/eventStore";
import { Decider, accept, reject } from "../src/es/domain/decider";
import { StorageFailureError } from "../src/es/domain/errors";

// counter ---------------------------------------------------------------------

export type Increment = { type: "Increment"; by: number };
export type Reset = { type: "Reset" };
export type Incremented = { type: "Incremented"; by: number };
export type ResetDone = { type: "ResetDone" };
/** Stored by an older release; no decider claims it any more. */
export type LegacyNoted = { type: "LegacyNoted"; note: string };

export type CounterCommand = Increment | Reset;
export type CounterEvent = Incremented | ResetDone | LegacyNoted;

export const counterDecider: Decider<CounterCommand, number, CounterEvent> = {
  commandTypes: ["Increment", "Reset"],
  eventTypes: ["Incremented", "ResetDone"],
  initialState: 0,
  decide(command, state) {
    switch (command.type) {
      case "Increment":
        if (command.by <= 0) return reject("NOT_POSITIVE", "by must be positive");
        return accept<CounterEvent>({ type: "Incremented", by: command.by });
      case "Reset":
        if (state === 0) return reject("ALREADY_ZERO", "counter is already zero");
        return accept<CounterEvent>({ type: "ResetDone" });
    }
  },
  evolve(state, event) {
    switch (event.type) {
      case "Incremented":
        return state + event.by;
      case "ResetDone":
        return 0;
      default:
        return state;
    }
  },
};

export function decodeCounterEvent(record: PersistedEvent): CounterEvent {
  const p = record.payload;
  if (typeof p === "object" && p !== null && "type" in p) {
    if (p.type === "Incremented" && "by" in p && typeof p.by === "number") {
      return { type: "Incremented", by: p.by };
    }
    if (p.type === "ResetDone") return { type: "ResetDone" };
  }
  throw new StorageFailureError(`undecodable event ${record.event_type}`);
}

// toggle ----------------------------------------------------------------------

export type Toggle = { type: "Toggle" };
export type Toggled = { type: "Toggled"; on: boolean };

export const toggleDecider: Decider<Toggle, boolean, Toggled> = {
  commandTypes: ["Toggle"],
  eventTypes: ["Toggled"],
  initialState: false,
  decide(_command, state) {
    return accept<Toggled>({ type: "Toggled", on: !state });
  },
  evolve(_state, event) {
    return event.on;
  },
};

// label -----------------------------------------------------------------------

export type SetLabel = { type: "SetLabel"; text: string };
export type LabelSet = { type: "LabelSet"; text: string };

export const labelDecider: Decider<SetLabel, { text: string }, LabelSet> = {
  commandTypes: ["SetLabel"],
  eventTypes: ["LabelSet"],
  initialState: { text: "" },
  decide(command, state) {
    if (command.text === state.text) return reject("UNCHANGED", "label unchanged");
    return accept<LabelSet>({ type: "LabelSet", text: command.text });
  },
  evolve(_state, event) {
    return { text: event.text };
  },
};
