export { Runner } from "./execution/runner";
export { ArgumentParser, parseInvocation } from "./core/arguments";
export { DeclarationParser, parseDeclarations } from "./core/parser";
export { Evaluator, evaluate } from "./core/evaluator";
export { Expander, parseExpansion } from "./core/expansion";
export { VariableTable } from "./core/variables";
export { Planner } from "./core/planner";
export { Executor, buildEnvironment } from "./execution/executor";
export { ShellCommandRunner } from "./execution/command-runner";
export { FileArtifactStore } from "./execution/artifacts";
export { Logger, TaskLogger } from "./utils/logger";
export {
  BuildError,
  CyclicDependencyError,
  DeclarationSyntaxError,
  ExpansionDepthExceeded,
  MissingDeclarationFileError,
  NoGoalError,
  RecipeFailure,
  UnknownTargetError,
  UsageError,
} from "./errors";

export type { RunOptions } from "./execution/runner";
export type { BuildGraph, EvaluateOptions } from "./core/evaluator";
export type { ArtifactStore } from "./execution/artifacts";
export type { CommandOptions, CommandRunner } from "./execution/command-runner";
export type {
  Config,
  EnvironmentOverlay,
  ExecutionPlan,
  ExecutionSummary,
  ParsedInvocation,
  PlanStep,
  RecipeLine,
  Statement,
  Target,
  Variable,
  VariableOverride,
} from "./types";
