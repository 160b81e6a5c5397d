import { describe, it, expect } from "vitest";
import { shouldTakeSnapshot } from "../src/es/domain/snapshot";

describe("Snapshot policy", () => {
  it("fires when an append reaches a multiple of N", () => {
    expect(shouldTakeSnapshot(2, 3, 3)).toBe(true);
    expect(shouldTakeSnapshot(5, 6, 3)).toBe(true);
    expect(shouldTakeSnapshot(0, 25, 25)).toBe(true);
  });

  it("does not fire between multiples", () => {
    expect(shouldTakeSnapshot(0, 1, 3)).toBe(false);
    expect(shouldTakeSnapshot(1, 2, 3)).toBe(false);
    expect(shouldTakeSnapshot(3, 5, 3)).toBe(false);
  });

  it("fires when a batch jumps over a multiple", () => {
    expect(shouldTakeSnapshot(23, 26, 25)).toBe(true);
    expect(shouldTakeSnapshot(1, 8, 3)).toBe(true);
  });

  it("never fires for N <= 0 or a stream that did not move forward", () => {
    expect(shouldTakeSnapshot(9, 10, 0)).toBe(false);
    expect(shouldTakeSnapshot(9, 10, -5)).toBe(false);
    expect(shouldTakeSnapshot(0, 0, 3)).toBe(false);
    expect(shouldTakeSnapshot(6, 6, 3)).toBe(false);
    expect(shouldTakeSnapshot(7, 6, 3)).toBe(false);
  });

  it("never fires on non-finite input", () => {
    expect(shouldTakeSnapshot(0, Number.NaN, 3)).toBe(false);
    expect(shouldTakeSnapshot(0, 3, Number.POSITIVE_INFINITY)).toBe(false);
  });
});
