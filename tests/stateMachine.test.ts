import { describe, it, expect } from "vitest";
import {
  InvalidTransitionError,
  ProvisionStateMachine,
  VALID_PROVISION_TRANSITIONS,
  isTerminalState,
  type ProvisionState
} from "../src/provision/stateMachine.js";

describe("ProvisionStateMachine", () => {
  it("records the path and timestamps of each transition", () => {
    const machine = new ProvisionStateMachine(() => new Date("2026-02-03T04:05:06.000Z"));
    machine.transition("FINGERPRINT");
    machine.transition("CACHE_MISS");
    machine.transition("BUILD");
    machine.transition("FAILED", "INSTALL_FAILED");

    expect(machine.state).toBe("FAILED");
    expect(machine.path).toEqual(["START", "FINGERPRINT", "CACHE_MISS", "BUILD", "FAILED"]);
    expect(machine.history[3]).toEqual({
      from: "BUILD",
      to: "FAILED",
      at: "2026-02-03T04:05:06.000Z",
      note: "INSTALL_FAILED"
    });
  });

  it("rejects transitions outside the table", () => {
    const machine = new ProvisionStateMachine();
    expect(() => machine.transition("BUILD")).toThrow(new InvalidTransitionError("START", "BUILD"));
    machine.transition("FINGERPRINT");
    machine.transition("CACHE_HIT");
    expect(() => machine.transition("READY")).toThrow("invalid provisioning transition: CACHE_HIT -> READY");
  });

  it("never reaches PACK from a restore", () => {
    expect(VALID_PROVISION_TRANSITIONS.RESTORE).not.toContain("PACK");
    expect(VALID_PROVISION_TRANSITIONS.CACHE_HIT).toEqual(["RESTORE"]);
  });

  it("has no way out of a terminal state", () => {
    const states = Object.keys(VALID_PROVISION_TRANSITIONS).filter((s): s is ProvisionState => s in VALID_PROVISION_TRANSITIONS);
    for (const s of states) {
      expect(VALID_PROVISION_TRANSITIONS[s].length === 0).toBe(isTerminalState(s));
    }
  });

  it("does not let callers rewrite history", () => {
    const machine = new ProvisionStateMachine();
    machine.transition("FINGERPRINT");
    machine.history.pop();
    expect(machine.history).toHaveLength(1);
  });
});
