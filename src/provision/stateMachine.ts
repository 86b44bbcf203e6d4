export type ProvisionState =
  | "START"
  | "FINGERPRINT"
  | "CACHE_HIT"
  | "CACHE_MISS"
  | "RESTORE"
  | "BUILD"
  | "PACK"
  | "READY"
  | "FAILED";

// RESTORE -> BUILD is taken only for a record that vanished mid-fetch or under the rebuild policy.
export const VALID_PROVISION_TRANSITIONS: Readonly<Record<ProvisionState, readonly ProvisionState[]>> = {
  START: ["FINGERPRINT"],
  FINGERPRINT: ["CACHE_HIT", "CACHE_MISS", "FAILED"],
  CACHE_HIT: ["RESTORE"],
  CACHE_MISS: ["BUILD"],
  RESTORE: ["READY", "BUILD", "FAILED"],
  BUILD: ["PACK", "FAILED"],
  PACK: ["READY"],
  READY: [],
  FAILED: []
};

export interface TransitionRecord {
  from: ProvisionState;
  to: ProvisionState;
  at: string;
  note?: string;
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: ProvisionState,
    readonly to: ProvisionState
  ) {
    super(`invalid provisioning transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function isTerminalState(state: ProvisionState): boolean {
  return state === "READY" || state === "FAILED";
}

export class ProvisionStateMachine {
  private current: ProvisionState = "START";
  private readonly records: TransitionRecord[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get state(): ProvisionState {
    return this.current;
  }

  get history(): TransitionRecord[] {
    return [...this.records];
  }

  /** The states visited, starting with START. */
  get path(): ProvisionState[] {
    return ["START", ...this.records.map((r) => r.to)];
  }

  transition(to: ProvisionState, note?: string): void {
    if (!VALID_PROVISION_TRANSITIONS[this.current].includes(to)) {
      throw new InvalidTransitionError(this.current, to);
    }
    const record: TransitionRecord = { from: this.current, to, at: this.clock().toISOString() };
    if (note !== undefined) record.note = note;
    this.records.push(record);
    this.current = to;
  }
}
