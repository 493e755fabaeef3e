import type { Graph } from "graphlib";

export type Config = {
  file?: string;
  directory?: string;
  dryRun?: boolean;
  silent?: boolean;
  ignoreErrors?: boolean;
  keepGoing?: boolean;
  alwaysMake?: boolean;
  question?: boolean;
  jobs?: number;
  prefix?: boolean | string;
  warnUndefined?: boolean;
  debug?: boolean;
  help?: boolean;
};

export type VariableOverride = {
  name: string;
  flavor: VariableFlavor;
  value: string;
};

export type ParsedInvocation = {
  goals: string[];
  overrides: VariableOverride[];
  config: Config;
};

export type SourceLocation = {
  file: string;
  line: number;
};

// Expressions

export type Segment =
  | { kind: "text"; value: string }
  | { kind: "reference"; name: Expansion };

export type Expansion = readonly Segment[];

export type VariableFlavor = "immediate" | "deferred";

export type VariableOrigin = "default" | "file" | "environment" | "command line";

export type Variable = {
  readonly name: string;
  readonly flavor: VariableFlavor;
  readonly raw: string;
  readonly value: Expansion;
  readonly origin: VariableOrigin;
};

// Statements produced by the declaration parser

export type AssignmentOperator = "=" | ":=" | "::=" | "?=" | "+=";

export type Guard =
  | { kind: "ifeq" | "ifneq"; left: string; right: string }
  | { kind: "ifdef" | "ifndef"; name: string };

export type ConditionalBranch = {
  guard: Guard;
  body: Statement[];
};

export type RecipeLine = {
  text: string;
  silent: boolean;
  ignoreErrors: boolean;
  always: boolean;
  line: number;
};

export type Statement =
  | {
      kind: "assignment";
      line: number;
      name: string;
      operator: AssignmentOperator;
      value: string;
      exported: boolean;
    }
  | { kind: "export"; line: number; names: string; unexport: boolean }
  | {
      kind: "conditional";
      line: number;
      branches: ConditionalBranch[];
      otherwise?: Statement[];
    }
  | {
      kind: "rule";
      line: number;
      targets: string;
      prerequisites: string;
      orderOnly: string;
    }
  | { kind: "recipe"; line: number; recipe: RecipeLine };

// Evaluated graph

export type Target = {
  readonly name: string;
  readonly prerequisites: readonly string[];
  readonly orderOnly: readonly string[];
  readonly recipe: readonly RecipeLine[];
  readonly phony: boolean;
  readonly line: number;
};

export type EnvironmentOverlay = {
  readonly variables: Readonly<Record<string, string>>;
  readonly unset: readonly string[];
};

export type PlanStep = {
  name: string;
  target: Target;
  dependencies: string[];
};

export type ExecutionPlan = {
  goals: string[];
  steps: PlanStep[];
  graph: Graph;
};

export type ExecutionSummary = {
  updated: string[];
  upToDate: string[];
  outOfDate: string[];
  commands: number;
};
