import { UsageError } from "../errors";
import type { ParsedInvocation } from "../types";

const OVERRIDE_PATTERN = /^([^\s=:#$]+?)(::?=|=)(.*)$/s;
const DIGITS = /^\d+$/;
const UNLIMITED_JOBS = Number.POSITIVE_INFINITY;

export class ArgumentParser {
  parse(args: string[]): ParsedInvocation {
    const result: ParsedInvocation = {
      config: {},
      goals: [],
      overrides: [],
    };

    let optionsEnded = false;
    for (let index = 0; index < args.length; index++) {
      const arg = args[index] ?? "";

      if (!optionsEnded && arg === "--") {
        optionsEnded = true;
      } else if (!optionsEnded && arg.startsWith("--")) {
        index += this.processLongFlag(arg.substring(2), args[index + 1], result);
      } else if (!optionsEnded && arg.startsWith("-") && arg.length > 1) {
        index += this.processShortFlags(arg.substring(1), args[index + 1], result);
      } else {
        this.processOperand(arg, result);
      }
    }

    return result;
  }

  private processOperand(arg: string, result: ParsedInvocation): void {
    const override = OVERRIDE_PATTERN.exec(arg);
    if (override?.[1]) {
      result.overrides.push({
        flavor: override[2] === "=" ? "deferred" : "immediate",
        name: override[1],
        value: override[3] ?? "",
      });
    } else if (arg) {
      result.goals.push(arg);
    }
  }

  /**
   * Returns how many of the following arguments were consumed as values.
   */
  // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: flat flag table
  private processLongFlag(
    flag: string,
    next: string | undefined,
    result: ParsedInvocation
  ): number {
    const equals = flag.indexOf("=");
    const name = equals === -1 ? flag : flag.substring(0, equals);
    const inline = equals === -1 ? undefined : flag.substring(equals + 1);
    const { config } = result;

    switch (name) {
      case "file":
      case "makefile":
        config.file = inline ?? this.requireValue(`--${name}`, next);
        return inline === undefined ? 1 : 0;
      case "directory":
        config.directory = inline ?? this.requireValue(`--${name}`, next);
        return inline === undefined ? 1 : 0;
      case "jobs":
        if (inline !== undefined) {
          config.jobs = this.parseJobs(inline);
          return 0;
        }
        if (next !== undefined && DIGITS.test(next)) {
          config.jobs = this.parseJobs(next);
          return 1;
        }
        config.jobs = UNLIMITED_JOBS;
        return 0;
      case "dry-run":
      case "just-print":
      case "recon":
        config.dryRun = true;
        return 0;
      case "silent":
      case "quiet":
        config.silent = true;
        return 0;
      case "ignore-errors":
        config.ignoreErrors = true;
        return 0;
      case "keep-going":
        config.keepGoing = true;
        return 0;
      case "always-make":
        config.alwaysMake = true;
        return 0;
      case "question":
        config.question = true;
        return 0;
      case "prefix":
        config.prefix = inline ?? true;
        return 0;
      case "no-prefix":
        config.prefix = false;
        return 0;
      case "warn-undefined-variables":
        config.warnUndefined = true;
        return 0;
      case "debug":
        config.debug = true;
        return 0;
      case "help":
        config.help = true;
        return 0;
      default:
        console.warn(`Unknown flag: --${flag}`);
        return 0;
    }
  }

  // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: flat flag table
  private processShortFlags(
    flags: string,
    next: string | undefined,
    result: ParsedInvocation
  ): number {
    const { config } = result;

    for (let i = 0; i < flags.length; i++) {
      const flag = flags[i];
      const rest = flags.substring(i + 1);

      if (flag === "f" || flag === "C") {
        const value = rest || this.requireValue(`-${flag}`, next);
        if (flag === "f") {
          config.file = value;
        } else {
          config.directory = value;
        }
        return rest ? 0 : 1;
      }

      if (flag === "j") {
        if (DIGITS.test(rest)) {
          config.jobs = this.parseJobs(rest);
          return 0;
        }
        if (!rest && next !== undefined && DIGITS.test(next)) {
          config.jobs = this.parseJobs(next);
          return 1;
        }
        config.jobs = UNLIMITED_JOBS;
        continue;
      }

      if (flag === "n") {
        config.dryRun = true;
      } else if (flag === "s") {
        config.silent = true;
      } else if (flag === "i") {
        config.ignoreErrors = true;
      } else if (flag === "k") {
        config.keepGoing = true;
      } else if (flag === "B") {
        config.alwaysMake = true;
      } else if (flag === "q") {
        config.question = true;
      } else if (flag === "h") {
        config.help = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }

    return 0;
  }

  private requireValue(flag: string, value: string | undefined): string {
    if (value === undefined || value === "") {
      throw new UsageError(`option '${flag}' requires an argument`);
    }
    return value;
  }

  private parseJobs(value: string): number {
    const jobs = Number.parseInt(value, 10);
    if (!DIGITS.test(value) || jobs < 1) {
      throw new UsageError(`invalid --jobs value '${value}'`);
    }
    return jobs;
  }
}

export function parseInvocation(args: string[]): ParsedInvocation {
  const parser = new ArgumentParser();
  return parser.parse(args);
}

/**
 * Split a flags variable such as `MAKESHIFTFLAGS="-s -j4"` into arguments.
 */
export function splitFlags(value: string | undefined): string[] {
  return (value ?? "").split(/\s+/).filter((arg) => arg.length > 0);
}
