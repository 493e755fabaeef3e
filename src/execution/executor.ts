import debug from "debug";
import type { BuildGraph } from "../core/evaluator";
import { DEFAULT_SHELL } from "../core/evaluator";
import { Expander } from "../core/expansion";
import { dependentsOf } from "../core/planner";
import { RecipeFailure, formatLocation } from "../errors";
import type {
  Config,
  EnvironmentOverlay,
  ExecutionPlan,
  ExecutionSummary,
  PlanStep,
  Target,
} from "../types";
import type { Logger } from "../utils/logger";
import type { ArtifactStore } from "./artifacts";
import type { CommandRunner } from "./command-runner";

const log = debug("makeshift:executor");

export type ExecutorOptions = Pick<
  Config,
  | "alwaysMake"
  | "dryRun"
  | "ignoreErrors"
  | "jobs"
  | "keepGoing"
  | "question"
  | "silent"
  | "warnUndefined"
> & {
  cwd: string;
  environment?: Readonly<Record<string, string | undefined>>;
  artifacts: ArtifactStore;
  commandRunner: CommandRunner;
  logger: Logger;
};

type Staleness = {
  reason: string;
  newer: string[];
};

/**
 * Inherited environment with the exported overlay on top and unexported
 * names removed.
 */
export function buildEnvironment(
  inherited: Readonly<Record<string, string | undefined>>,
  overlay: EnvironmentOverlay
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(inherited)) {
    if (value !== undefined) {
      env[name] = value;
    }
  }
  Object.assign(env, overlay.variables);
  for (const name of overlay.unset) {
    delete env[name];
  }
  return env;
}

export class Executor {
  private readonly updated = new Set<string>();
  private readonly failures: RecipeFailure[] = [];
  private readonly env: Record<string, string>;
  private readonly shell: string;
  private readonly logger: Logger;

  constructor(
    private readonly build: BuildGraph,
    private readonly options: ExecutorOptions
  ) {
    this.logger = options.logger;
    this.env = buildEnvironment(
      options.environment ?? process.env,
      build.environment
    );
    this.shell =
      new Expander(build.variables).valueOf("SHELL").trim() || DEFAULT_SHELL;
  }

  async execute(plan: ExecutionPlan): Promise<ExecutionSummary> {
    log("=== Starting execution ===");
    log("Steps:", plan.steps.map((step) => step.name));

    const summary: ExecutionSummary = {
      commands: 0,
      outOfDate: [],
      upToDate: [],
      updated: [],
    };

    // Register up front so prefixes line up from the first line of output
    for (const step of plan.steps) {
      this.logger.registerTask(step.name);
    }

    const jobs = this.options.jobs ?? 1;
    if (jobs > 1) {
      await this.executeConcurrently(plan, jobs, summary);
    } else {
      await this.executeSequentially(plan, summary);
    }

    const [failure] = this.failures;
    if (failure) {
      throw failure;
    }
    log("=== Execution finished ===");
    return summary;
  }

  private async executeSequentially(
    plan: ExecutionPlan,
    summary: ExecutionSummary
  ): Promise<void> {
    const blocked = new Set<string>();

    for (const step of plan.steps) {
      if (blocked.has(step.name)) {
        this.logger.warn(`Target '${step.name}' not remade because of errors.`);
        continue;
      }

      try {
        await this.runStep(step, summary);
      } catch (error) {
        if (!(error instanceof RecipeFailure && this.options.keepGoing)) {
          throw error;
        }
        this.failures.push(error);
        for (const dependent of dependentsOf(plan, step.name)) {
          blocked.add(dependent);
        }
      }
    }
  }

  // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: scheduling loop
  private async executeConcurrently(
    plan: ExecutionPlan,
    jobs: number,
    summary: ExecutionSummary
  ): Promise<void> {
    const pending = [...plan.steps];
    const running = new Map<string, Promise<void>>();
    const completed = new Set<string>();
    const blocked = new Set<string>();
    const fatal: unknown[] = [];

    const start = (step: PlanStep): void => {
      log(`Starting ${step.name}`);
      const task = this.runStep(step, summary)
        .then(
          () => {
            completed.add(step.name);
            log(`Completed ${step.name}`);
          },
          (error: unknown) => {
            if (error instanceof RecipeFailure && this.options.keepGoing) {
              this.failures.push(error);
              for (const dependent of dependentsOf(plan, step.name)) {
                blocked.add(dependent);
              }
            } else {
              fatal.push(error);
            }
          }
        )
        .finally(() => {
          running.delete(step.name);
        });
      running.set(step.name, task);
    };

    while (pending.length > 0 || running.size > 0) {
      let index = 0;
      while (
        fatal.length === 0 &&
        index < pending.length &&
        running.size < jobs
      ) {
        const step = pending[index];
        if (!step) {
          break;
        }
        if (blocked.has(step.name)) {
          pending.splice(index, 1);
          this.logger.warn(`Target '${step.name}' not remade because of errors.`);
        } else if (step.dependencies.every((dep) => completed.has(dep))) {
          pending.splice(index, 1);
          start(step);
        } else {
          log(`${step.name} waiting for prerequisites`);
          index++;
        }
      }

      if (running.size === 0) {
        break;
      }
      await Promise.race(running.values());
    }

    if (fatal.length > 0) {
      throw fatal[0];
    }
  }

  private async runStep(
    step: PlanStep,
    summary: ExecutionSummary
  ): Promise<void> {
    const { name, target } = step;
    const staleness = this.staleness(target);
    if (!staleness) {
      log(`${name} is up to date`);
      summary.upToDate.push(name);
      return;
    }
    log(`${name} must be remade: ${staleness.reason}`);

    if (this.options.question) {
      summary.outOfDate.push(name);
      this.updated.add(name);
      return;
    }

    const expander = new Expander(this.build.variables, {
      automatic: automaticVariables(target, staleness.newer),
      onUndefined: (variable) => {
        if (this.options.warnUndefined) {
          this.logger.warn(`warning: undefined variable '${variable}'`);
        }
      },
    });
    const logger = this.logger.createTaskLogger(name);

    for (const line of target.recipe) {
      const location = { file: this.build.file, line: line.line };
      const command = expander.expandText(line.text, location);

      if (!(line.silent || this.options.silent)) {
        logger.command(command);
      }
      summary.commands++;
      if (this.options.dryRun && !line.always) {
        continue;
      }

      const status = await this.options.commandRunner.run(command, {
        cwd: this.options.cwd,
        env: this.env,
        output: this.logger.prefixed ? logger : undefined,
        shell: this.shell,
      });

      if (status !== 0) {
        if (line.ignoreErrors || this.options.ignoreErrors) {
          this.logger.warn(
            `[${formatLocation(location)}: ${name}] Error ${status} (ignored)`
          );
          continue;
        }
        const failure = new RecipeFailure(name, location, command, status);
        this.logger.fail(failure.message);
        throw failure;
      }
    }

    this.updated.add(name);
    summary.updated.push(name);
  }

  private staleness(target: Target): Staleness | undefined {
    const own = target.phony
      ? undefined
      : this.options.artifacts.modifiedTime(target.name);
    const newer = target.prerequisites.filter(
      (prerequisite) =>
        own === undefined ||
        this.updated.has(prerequisite) ||
        (this.options.artifacts.modifiedTime(prerequisite) ?? 0) > own
    );

    if (target.phony) {
      return { newer, reason: "phony target" };
    }
    if (this.options.alwaysMake) {
      return { newer, reason: "--always-make" };
    }
    if (own === undefined) {
      return { newer, reason: "artifact missing" };
    }
    if (newer.length > 0) {
      return { newer, reason: `newer prerequisites: ${newer.join(" ")}` };
    }
    return undefined;
  }
}

function automaticVariables(
  target: Target,
  newer: string[]
): ReadonlyMap<string, string> {
  return new Map([
    ["@", target.name],
    ["<", target.prerequisites[0] ?? ""],
    ["^", target.prerequisites.join(" ")],
    ["?", newer.join(" ")],
    ["|", target.orderOnly.join(" ")],
  ]);
}
