import { describe, it, expect } from "vitest";
import { accept, computeNewEvents, fold, reject } from "../src/es/domain/decider";
import { CounterEvent, counterDecider, labelDecider } from "./_toyDeciders";

describe("decider algebra", () => {
  it("accept/reject build the two decision shapes", () => {
    expect(accept({ type: "Incremented", by: 1 })).toEqual({
      ok: true,
      events: [{ type: "Incremented", by: 1 }],
    });
    expect(accept()).toEqual({ ok: true, events: [] });
    expect(reject("NOPE", "not allowed")).toEqual({ ok: false, code: "NOPE", message: "not allowed" });
  });

  it("fold starts from initialState and applies events in order", () => {
    const history: CounterEvent[] = [
      { type: "Incremented", by: 2 },
      { type: "Incremented", by: 3 },
      { type: "ResetDone" },
      { type: "Incremented", by: 4 },
    ];
    expect(fold(counterDecider, history)).toBe(4);
    expect(fold(counterDecider, [])).toBe(0);
  });

  it("fold from an explicit base continues where a snapshot left off", () => {
    expect(fold(counterDecider, [{ type: "Incremented", by: 1 }], 10)).toBe(11);
  });

  it("evolve leaves state untouched for tags the decider does not own", () => {
    expect(counterDecider.evolve(7, { type: "LegacyNoted", note: "old" })).toBe(7);
  });

  it("fold is deterministic: same history, same state", () => {
    const history: CounterEvent[] = [
      { type: "Incremented", by: 5 },
      { type: "Incremented", by: 1 },
    ];
    expect(fold(counterDecider, history)).toBe(fold(counterDecider, history));
  });

  it("decide is pure: repeated calls give equal decisions and do not touch state", () => {
    const state = { text: "draft" };
    const first = labelDecider.decide({ type: "SetLabel", text: "final" }, state);
    const second = labelDecider.decide({ type: "SetLabel", text: "final" }, state);

    expect(first).toEqual(second);
    expect(state).toEqual({ text: "draft" });
  });

  it("computeNewEvents replays history before deciding", () => {
    expect(computeNewEvents(counterDecider, [], { type: "Reset" })).toEqual({
      ok: false,
      code: "ALREADY_ZERO",
      message: "counter is already zero",
    });
    expect(
      computeNewEvents(counterDecider, [{ type: "Incremented", by: 2 }], { type: "Reset" })
    ).toEqual({ ok: true, events: [{ type: "ResetDone" }] });
  });

  it("a rejection carries no events", () => {
    const decision = counterDecider.decide({ type: "Increment", by: 0 }, 0);
    expect(decision.ok).toBe(false);
    expect("events" in decision).toBe(false);
  });
});
