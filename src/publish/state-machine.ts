import { InvalidTransitionError } from "../errors.js";

/**
 * Publish states, in order. The workflow is linear:
 * idle → version_bumped → built → placed, or idle → built → placed when an
 * existing package is supplied.
 */
export const PUBLISH_STATES = ["idle", "version_bumped", "built", "placed"] as const;

export type PublishState = (typeof PUBLISH_STATES)[number];

/** `adopt` takes a supplied package in place of bump + build. */
export type PublishEvent = "bump" | "build" | "adopt" | "place";

const TRANSITIONS: Record<PublishState, Partial<Record<PublishEvent, PublishState>>> = {
  idle: { bump: "version_bumped", adopt: "built" },
  version_bumped: { build: "built" },
  built: { place: "placed" },
  placed: {},
};

/** Pure function: given current state + event, return the next state. */
export function nextState(current: PublishState, event: PublishEvent): PublishState {
  const next = TRANSITIONS[current][event];
  if (!next) throw new InvalidTransitionError(current, event);
  return next;
}

export function isTerminal(state: PublishState): boolean {
  return state === "placed";
}
