import type { Variable, VariableOrigin } from "../types";
import type { VariableLookup } from "./expansion";

const ORIGIN_RANK: Record<VariableOrigin, number> = {
  default: 0,
  file: 1,
  environment: 2,
  "command line": 3,
};

/**
 * Whether a binding from `incoming` may replace one from `existing`.
 * Command line beats the inherited environment, which beats the file,
 * which beats built-in defaults.
 */
export function canOverride(
  incoming: VariableOrigin,
  existing: VariableOrigin
): boolean {
  return ORIGIN_RANK[incoming] >= ORIGIN_RANK[existing];
}

/**
 * Frozen variable table handed to the planner and executor once
 * evaluation is over.
 */
export class VariableTable implements VariableLookup {
  private readonly entries: ReadonlyMap<string, Variable>;

  constructor(variables: Iterable<Variable>) {
    const entries = new Map<string, Variable>();
    for (const variable of variables) {
      entries.set(variable.name, Object.freeze({ ...variable }));
    }
    this.entries = entries;
  }

  lookup(name: string): Variable | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }
}
