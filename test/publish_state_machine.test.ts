import { describe, expect, it } from "vitest";
import { nextState, isTerminal, PUBLISH_STATES } from "../src/publish/state-machine.js";
import { InvalidTransitionError } from "../src/errors.js";

describe("publish state machine", () => {
  it("follows bump → build → place", () => {
    let state = nextState("idle", "bump");
    expect(state).toBe("version_bumped");
    state = nextState(state, "build");
    expect(state).toBe("built");
    state = nextState(state, "place");
    expect(state).toBe("placed");
    expect(isTerminal(state)).toBe(true);
  });

  it("adopts a supplied package straight into built", () => {
    expect(nextState("idle", "adopt")).toBe("built");
  });

  it("rejects out-of-order events", () => {
    expect(() => nextState("idle", "place")).toThrow(InvalidTransitionError);
    expect(() => nextState("version_bumped", "adopt")).toThrow(InvalidTransitionError);
    expect(() => nextState("placed", "bump")).toThrow("Publish cannot apply 'bump' in state 'placed'");
  });

  it("only placed is terminal", () => {
    expect(PUBLISH_STATES.filter(isTerminal)).toEqual(["placed"]);
  });
});
