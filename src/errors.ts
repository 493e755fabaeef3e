import type { SourceLocation } from "./types";

export const BUILD_ERROR_EXIT_CODE = 2;

export type BuildErrorKind =
  | "UsageError"
  | "MissingDeclarationFile"
  | "SyntaxError"
  | "ExpansionDepthExceeded"
  | "NoGoal"
  | "CyclicDependencyError"
  | "UnknownTargetError"
  | "RecipeFailure";

export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}`;
}

export abstract class BuildError extends Error {
  abstract readonly kind: BuildErrorKind;

  get exitCode(): number {
    return BUILD_ERROR_EXIT_CODE;
  }
}

export class UsageError extends BuildError {
  readonly kind = "UsageError";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class MissingDeclarationFileError extends BuildError {
  readonly kind = "MissingDeclarationFile";

  constructor(
    public readonly directory: string,
    public readonly file?: string
  ) {
    super(
      file
        ? `${file}: No such file or directory`
        : `No targets specified and no makefile found in ${directory}`
    );
    this.name = "MissingDeclarationFileError";
  }
}

export class DeclarationSyntaxError extends BuildError {
  readonly kind = "SyntaxError";

  constructor(
    public readonly reason: string,
    public readonly location?: SourceLocation
  ) {
    super(location ? `${formatLocation(location)}: ${reason}` : reason);
    this.name = "DeclarationSyntaxError";
  }

  /**
   * Attach a location to an error raised by code that only saw a fragment
   * of the line (e.g. reference parsing).
   */
  at(location: SourceLocation): DeclarationSyntaxError {
    return this.location ? this : new DeclarationSyntaxError(this.reason, location);
  }
}

export class ExpansionDepthExceeded extends BuildError {
  readonly kind = "ExpansionDepthExceeded";
  readonly path: string[];

  constructor(
    chain: string[],
    public readonly limit: number
  ) {
    const path = trimToFirstRepeat(chain);
    super(
      `Variable expansion exceeded depth ${limit}: ${path.join(" -> ")}`
    );
    this.name = "ExpansionDepthExceeded";
    this.path = path;
  }
}

export class NoGoalError extends BuildError {
  readonly kind = "NoGoal";

  constructor() {
    super("No targets");
    this.name = "NoGoalError";
  }
}

export class CyclicDependencyError extends BuildError {
  readonly kind = "CyclicDependencyError";

  constructor(public readonly cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(" -> ")}`);
    this.name = "CyclicDependencyError";
  }
}

export class UnknownTargetError extends BuildError {
  readonly kind = "UnknownTargetError";

  constructor(
    public readonly target: string,
    public readonly referencedBy?: string
  ) {
    super(
      referencedBy
        ? `No rule to make target '${target}', needed by '${referencedBy}'`
        : `No rule to make target '${target}'`
    );
    this.name = "UnknownTargetError";
  }
}

export class RecipeFailure extends BuildError {
  readonly kind = "RecipeFailure";

  constructor(
    public readonly target: string,
    public readonly location: SourceLocation,
    public readonly command: string,
    public readonly status: number
  ) {
    super(`[${formatLocation(location)}: ${target}] Error ${status}`);
    this.name = "RecipeFailure";
  }

  override get exitCode(): number {
    return this.status;
  }
}

function trimToFirstRepeat(chain: string[]): string[] {
  const seen = new Map<string, number>();
  for (const [index, name] of chain.entries()) {
    const first = seen.get(name);
    if (first !== undefined) {
      return chain.slice(first, index + 1);
    }
    seen.set(name, index);
  }
  return chain;
}
