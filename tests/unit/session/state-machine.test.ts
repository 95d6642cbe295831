import { describe, expect, it } from "vitest";

import { canTransition, isSessionStatus, SESSION_STATUSES } from "../../../src/session/state-machine.js";

describe("session state machine", () => {
  it("lists statuses in lifecycle order", () => {
    expect(SESSION_STATUSES).toEqual(["active", "completed", "archived"]);
  });

  it("only moves forward", () => {
    expect(canTransition("active", "completed")).toBe(true);
    expect(canTransition("active", "archived")).toBe(true);
    expect(canTransition("completed", "archived")).toBe(true);
    expect(canTransition("completed", "active")).toBe(false);
    expect(canTransition("archived", "active")).toBe(false);
    expect(canTransition("archived", "completed")).toBe(false);
  });

  it("allows staying in place", () => {
    for (const status of SESSION_STATUSES) {
      expect(canTransition(status, status)).toBe(true);
    }
  });

  it("recognizes known statuses only", () => {
    expect(isSessionStatus("completed")).toBe(true);
    expect(isSessionStatus("deleted")).toBe(false);
    expect(isSessionStatus("toString")).toBe(false);
  });
});
