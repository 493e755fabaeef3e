import debug from "debug";
import { DeclarationSyntaxError, formatLocation } from "../errors";
import type {
  EnvironmentOverlay,
  Guard,
  RecipeLine,
  SourceLocation,
  Statement,
  Target,
  Variable,
  VariableFlavor,
  VariableOrigin,
  VariableOverride,
} from "../types";
import { Expander, literal, parseExpansion, type VariableLookup } from "./expansion";
import { VariableTable, canOverride } from "./variables";

const log = debug("makeshift:evaluator");

const ENVIRONMENT_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const WORD_SPLIT = /\s+/;

export const PROGRAM_NAME = "makeshift";
export const DEFAULT_SHELL = "/bin/sh";

export type EvaluateOptions = {
  file?: string;
  root?: string;
  goals?: readonly string[];
  environment?: Readonly<Record<string, string | undefined>>;
  overrides?: readonly VariableOverride[];
  warnUndefined?: boolean;
};

export type BuildGraph = {
  readonly file: string;
  readonly variables: VariableTable;
  readonly targets: ReadonlyMap<string, Target>;
  readonly defaultGoal?: string;
  readonly environment: EnvironmentOverlay;
  readonly warnings: readonly string[];
};

type TargetDraft = {
  name: string;
  prerequisites: string[];
  orderOnly: string[];
  recipe: RecipeLine[];
  recipeRule?: number;
  line: number;
};

type RuleContext = {
  targets: TargetDraft[];
  line: number;
};

/**
 * Walks parsed statements once, in file order: resolves conditionals,
 * applies assignments under origin precedence and collects targets.
 * Produces an immutable BuildGraph.
 */
export class Evaluator implements VariableLookup {
  private readonly variables = new Map<string, Variable>();
  private readonly targets = new Map<string, TargetDraft>();
  private readonly phony = new Set<string>();
  private readonly exported = new Set<string>();
  private readonly unexported = new Set<string>();
  private readonly warnings: string[] = [];
  private readonly warnedUndefined = new Set<string>();
  private readonly expander: Expander;
  private readonly file: string;
  private exportAll = false;
  private firstTarget?: string;
  private rule?: RuleContext;

  constructor(private readonly options: EvaluateOptions = {}) {
    this.file = options.file ?? "Makefile";
    this.expander = new Expander(this, {
      onUndefined: (name) => this.reportUndefined(name),
    });
    this.seed();
  }

  lookup(name: string): Variable | undefined {
    return this.variables.get(name);
  }

  evaluate(statements: readonly Statement[]): BuildGraph {
    this.walk(statements);

    const variables = new VariableTable(this.variables.values());
    const targets = this.finalizeTargets();
    const defaultGoal = this.resolveDefaultGoal(variables);
    const environment = this.materializeEnvironment(variables);

    log("Variables:", variables.names().length);
    log("Targets:", Array.from(targets.keys()));
    log("Default goal:", defaultGoal);
    log("Exported:", Object.keys(environment.variables));

    return {
      defaultGoal,
      environment,
      file: this.file,
      targets,
      variables,
      warnings: [...this.warnings],
    };
  }

  private seed(): void {
    const { environment = {}, overrides = [], goals = [], root } = this.options;

    this.define("SHELL", "immediate", DEFAULT_SHELL, "default");
    this.define("MAKE", "immediate", PROGRAM_NAME, "default");
    this.define("CURDIR", "immediate", root ?? process.cwd(), "default");
    this.define("MAKECMDGOALS", "immediate", goals.join(" "), "default");

    for (const [name, value] of Object.entries(environment)) {
      // SHELL always comes from the declaration file or the default
      if (value === undefined || name === "SHELL") {
        continue;
      }
      this.define(name, "immediate", value, "environment");
    }

    // `NAME:=value` expands against the defaults and environment seeded above
    for (const override of overrides) {
      const raw =
        override.flavor === "immediate"
          ? this.expander.expandText(override.value)
          : override.value;
      this.define(override.name, override.flavor, raw, "command line");
    }
  }

  private walk(statements: readonly Statement[]): void {
    for (const statement of statements) {
      const location = this.location(statement.line);
      try {
        this.apply(statement, location);
      } catch (error) {
        if (error instanceof DeclarationSyntaxError) {
          throw error.at(location);
        }
        throw error;
      }
    }
  }

  private apply(statement: Statement, location: SourceLocation): void {
    switch (statement.kind) {
      case "assignment":
        this.rule = undefined;
        this.assign(statement, location);
        break;
      case "export":
        this.rule = undefined;
        this.applyExport(statement.names, statement.unexport, location);
        break;
      case "conditional":
        this.applyConditional(statement, location);
        break;
      case "rule":
        this.applyRule(statement, location);
        break;
      case "recipe":
        this.applyRecipe(statement.recipe, location);
        break;
    }
  }

  private assign(
    statement: Extract<Statement, { kind: "assignment" }>,
    location: SourceLocation
  ): void {
    const name = this.expander.expandText(statement.name, location).trim();
    if (!name) {
      throw new DeclarationSyntaxError("empty variable name", location);
    }
    if (statement.exported) {
      this.markExported(name);
    }

    const existing = this.variables.get(name);
    if (existing && !canOverride("file", existing.origin)) {
      log(`Ignoring file assignment to ${name} (origin: ${existing.origin})`);
      return;
    }

    switch (statement.operator) {
      case "=":
        this.define(name, "deferred", statement.value, "file");
        break;
      case ":=":
      case "::=":
        this.define(
          name,
          "immediate",
          this.expander.expandText(statement.value, location),
          "file"
        );
        break;
      case "?=":
        if (!existing) {
          this.define(name, "deferred", statement.value, "file");
        }
        break;
      case "+=":
        this.append(name, existing, statement.value, location);
        break;
    }
  }

  private append(
    name: string,
    existing: Variable | undefined,
    value: string,
    location: SourceLocation
  ): void {
    if (!existing) {
      this.define(name, "deferred", value, "file");
      return;
    }

    const addition =
      existing.flavor === "immediate"
        ? this.expander.expandText(value, location)
        : value;
    const raw = existing.raw ? `${existing.raw} ${addition}` : addition;
    this.define(name, existing.flavor, raw, "file");
  }

  private define(
    name: string,
    flavor: VariableFlavor,
    raw: string,
    origin: VariableOrigin
  ): void {
    const value = flavor === "immediate" ? literal(raw) : parseExpansion(raw);
    this.variables.set(name, { flavor, name, origin, raw, value });
  }

  private applyExport(
    names: string,
    unexport: boolean,
    location: SourceLocation
  ): void {
    const list = this.words(names, location);
    if (list.length === 0) {
      this.exportAll = !unexport;
      return;
    }

    for (const name of list) {
      if (unexport) {
        this.exported.delete(name);
        this.unexported.add(name);
      } else {
        this.markExported(name);
      }
    }
  }

  private markExported(name: string): void {
    this.exported.add(name);
    this.unexported.delete(name);
  }

  private applyConditional(
    statement: Extract<Statement, { kind: "conditional" }>,
    location: SourceLocation
  ): void {
    for (const branch of statement.branches) {
      if (this.test(branch.guard, location)) {
        this.walk(branch.body);
        return;
      }
    }
    if (statement.otherwise) {
      this.walk(statement.otherwise);
    }
  }

  private test(guard: Guard, location: SourceLocation): boolean {
    switch (guard.kind) {
      case "ifeq":
      case "ifneq": {
        const left = this.expander.expandText(guard.left, location);
        const right = this.expander.expandText(guard.right, location);
        return (left === right) === (guard.kind === "ifeq");
      }
      case "ifdef":
      case "ifndef": {
        const name = this.expander.expandText(guard.name, location).trim();
        const defined = Boolean(this.variables.get(name)?.raw);
        return defined === (guard.kind === "ifdef");
      }
    }
  }

  private applyRule(
    statement: Extract<Statement, { kind: "rule" }>,
    location: SourceLocation
  ): void {
    const names = this.words(statement.targets, location);
    const prerequisites = this.words(statement.prerequisites, location);
    const orderOnly = this.words(statement.orderOnly, location);

    const drafts: TargetDraft[] = [];
    for (const name of names) {
      if (name === ".PHONY") {
        for (const prerequisite of prerequisites) {
          this.phony.add(prerequisite);
        }
        continue;
      }

      if (this.firstTarget === undefined && !name.startsWith(".")) {
        this.firstTarget = name;
      }

      let draft = this.targets.get(name);
      if (!draft) {
        draft = {
          line: statement.line,
          name,
          orderOnly: [],
          prerequisites: [],
          recipe: [],
        };
        this.targets.set(name, draft);
      }
      pushUnique(draft.prerequisites, prerequisites);
      pushUnique(draft.orderOnly, orderOnly);
      drafts.push(draft);
    }

    this.rule = { line: statement.line, targets: drafts };
  }

  private applyRecipe(recipe: RecipeLine, location: SourceLocation): void {
    if (!this.rule) {
      throw new DeclarationSyntaxError(
        "recipe commences before first target",
        location
      );
    }

    for (const draft of this.rule.targets) {
      if (draft.recipeRule !== this.rule.line) {
        if (draft.recipe.length > 0) {
          this.warnings.push(
            `${formatLocation(location)}: warning: overriding recipe for target '${draft.name}'`
          );
          draft.recipe = [];
        }
        draft.recipeRule = this.rule.line;
      }
      draft.recipe.push(recipe);
    }
  }

  private finalizeTargets(): ReadonlyMap<string, Target> {
    for (const name of this.phony) {
      if (!this.targets.has(name)) {
        this.targets.set(name, {
          line: 0,
          name,
          orderOnly: [],
          prerequisites: [],
          recipe: [],
        });
      }
    }

    const targets = new Map<string, Target>();
    for (const draft of this.targets.values()) {
      targets.set(
        draft.name,
        Object.freeze({
          line: draft.line,
          name: draft.name,
          orderOnly: Object.freeze([...draft.orderOnly]),
          phony: this.phony.has(draft.name),
          prerequisites: Object.freeze([...draft.prerequisites]),
          recipe: Object.freeze([...draft.recipe]),
        })
      );
    }
    return targets;
  }

  private resolveDefaultGoal(variables: VariableTable): string | undefined {
    if (variables.has(".DEFAULT_GOAL")) {
      const goal = new Expander(variables).valueOf(".DEFAULT_GOAL").trim();
      if (goal) {
        return goal;
      }
    }
    return this.firstTarget;
  }

  private materializeEnvironment(variables: VariableTable): EnvironmentOverlay {
    const expander = new Expander(variables);
    const names = new Set<string>(this.exported);

    for (const name of variables.names()) {
      const origin = variables.lookup(name)?.origin;
      if (origin === "command line" || (this.exportAll && origin !== "default")) {
        names.add(name);
      }
    }

    const exported: Record<string, string> = {};
    for (const name of names) {
      if (this.unexported.has(name) || !ENVIRONMENT_NAME.test(name)) {
        continue;
      }
      if (variables.has(name)) {
        exported[name] = expander.valueOf(name);
      }
    }

    return Object.freeze({
      unset: Object.freeze([...this.unexported]),
      variables: Object.freeze(exported),
    });
  }

  private words(text: string, location: SourceLocation): string[] {
    return this.expander
      .expandText(text, location)
      .split(WORD_SPLIT)
      .filter((word) => word.length > 0);
  }

  private reportUndefined(name: string): void {
    if (!this.options.warnUndefined || this.warnedUndefined.has(name)) {
      return;
    }
    this.warnedUndefined.add(name);
    this.warnings.push(`warning: undefined variable '${name}'`);
  }

  private location(line: number): SourceLocation {
    return { file: this.file, line };
  }
}

export function evaluate(
  statements: readonly Statement[],
  options: EvaluateOptions = {}
): BuildGraph {
  const evaluator = new Evaluator(options);
  return evaluator.evaluate(statements);
}

function pushUnique(list: string[], items: readonly string[]): void {
  for (const item of items) {
    if (!list.includes(item)) {
      list.push(item);
    }
  }
}
