import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import debug from "debug";
import { parseInvocation, splitFlags } from "../core/arguments";
import { evaluate } from "../core/evaluator";
import { parseDeclarations } from "../core/parser";
import { Planner } from "../core/planner";
import {
  BUILD_ERROR_EXIT_CODE,
  BuildError,
  MissingDeclarationFileError,
  RecipeFailure,
} from "../errors";
import type { Config, ExecutionPlan, ExecutionSummary } from "../types";
import { showHelp } from "../utils/help";
import { Logger } from "../utils/logger";
import { type ArtifactStore, FileArtifactStore } from "./artifacts";
import { type CommandRunner, ShellCommandRunner } from "./command-runner";
import { Executor } from "./executor";

const log = debug("makeshift:runner");

const DECLARATION_FILES = ["GNUmakefile", "makefile", "Makefile"];
const FLAGS_VARIABLE = "MAKESHIFTFLAGS";

export type RunOptions = {
  cwd?: string;
  environment?: Readonly<Record<string, string | undefined>>;
  config?: Config;
  commandRunner?: CommandRunner;
  artifacts?: ArtifactStore;
};

export class Runner {
  /**
   * Run one invocation and return its exit status.
   */
  async run(args: string[], options: RunOptions = {}): Promise<number> {
    const environment = options.environment ?? process.env;
    let logger = new Logger(options.config);

    try {
      const parsed = parseInvocation([
        ...splitFlags(environment[FLAGS_VARIABLE]),
        ...args,
      ]);
      const config: Config = { ...parsed.config, ...options.config };
      logger = new Logger(config);

      if (config.help) {
        showHelp();
        return 0;
      }
      if (config.debug) {
        debug.enable("makeshift:*");
      }

      const root = resolve(options.cwd ?? process.cwd(), config.directory ?? ".");
      const file = this.locate(root, config.file);
      log(`Reading ${file} in ${root}`);

      const statements = parseDeclarations(
        readFileSync(resolve(root, file), "utf-8"),
        file
      );
      const build = evaluate(statements, {
        environment,
        file,
        goals: parsed.goals,
        overrides: parsed.overrides,
        root,
        warnUndefined: config.warnUndefined,
      });
      for (const warning of build.warnings) {
        logger.warn(warning);
      }

      const artifacts = options.artifacts ?? new FileArtifactStore(root);
      const plan = new Planner(build, artifacts).plan(parsed.goals);

      const executor = new Executor(build, {
        ...config,
        artifacts,
        commandRunner: options.commandRunner ?? new ShellCommandRunner(),
        cwd: root,
        environment,
        logger,
      });
      const summary = await executor.execute(plan);

      if (config.question) {
        return summary.outOfDate.length > 0 ? 1 : 0;
      }
      this.report(plan, summary, logger);
      return 0;
    } catch (error) {
      // The executor reports recipe failures as they happen
      if (error instanceof RecipeFailure) {
        return error.exitCode;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.fail(message);
      return error instanceof BuildError
        ? error.exitCode
        : BUILD_ERROR_EXIT_CODE;
    }
  }

  private locate(root: string, file: string | undefined): string {
    if (file) {
      if (!existsSync(resolve(root, file))) {
        throw new MissingDeclarationFileError(root, file);
      }
      return file;
    }

    const found = DECLARATION_FILES.find((name) =>
      existsSync(resolve(root, name))
    );
    if (!found) {
      throw new MissingDeclarationFileError(root);
    }
    return found;
  }

  private report(
    plan: ExecutionPlan,
    summary: ExecutionSummary,
    logger: Logger
  ): void {
    // A goal with no step is a file without a rule
    const planned = new Set(plan.steps.map((step) => step.name));
    for (const goal of plan.goals) {
      if (summary.upToDate.includes(goal) || !planned.has(goal)) {
        logger.info(`'${goal}' is up to date.`);
      } else if (summary.updated.includes(goal) && summary.commands === 0) {
        logger.info(`Nothing to be done for '${goal}'.`);
      }
    }
  }
}
