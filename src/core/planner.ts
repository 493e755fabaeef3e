import debug from "debug";
import graphlib from "graphlib";
import type { Graph } from "graphlib";
import {
  CyclicDependencyError,
  NoGoalError,
  UnknownTargetError,
} from "../errors";
import type { ArtifactStore } from "../execution/artifacts";
import type { ExecutionPlan, PlanStep } from "../types";
import type { BuildGraph } from "./evaluator";

const log = debug("makeshift:planner");

export class Planner {
  constructor(
    private readonly build: BuildGraph,
    private readonly artifacts: ArtifactStore
  ) {}

  /**
   * Build a prerequisite-first, deduplicated plan for the given goals
   * (or the default goal). Edges go from dependent to prerequisite.
   */
  plan(goals: readonly string[] = []): ExecutionPlan {
    const requested = goals.length > 0 ? [...goals] : this.defaultGoals();
    const graph: Graph = new graphlib.Graph({ directed: true });
    const steps: PlanStep[] = [];
    const resolved = new Set<string>();
    const path: string[] = [];

    log("=== Planning ===");
    log("Goals:", requested);

    const visit = (name: string, referencedBy?: string): void => {
      if (resolved.has(name)) {
        log(`Already planned ${name}, skipping`);
        return;
      }

      const onPath = path.indexOf(name);
      if (onPath !== -1) {
        throw new CyclicDependencyError([...path.slice(onPath), name]);
      }

      const target = this.build.targets.get(name);
      if (!target) {
        if (this.artifacts.exists(name)) {
          log(`${name} has no rule but exists on disk, treating as a leaf`);
          graph.setNode(name);
          resolved.add(name);
          return;
        }
        throw new UnknownTargetError(name, referencedBy);
      }

      path.push(name);
      graph.setNode(name);
      const prerequisites = [
        ...target.prerequisites,
        ...target.orderOnly.filter((p) => !target.prerequisites.includes(p)),
      ];
      for (const prerequisite of prerequisites) {
        visit(prerequisite, name);
        graph.setEdge(name, prerequisite);
      }
      path.pop();

      resolved.add(name);
      steps.push({
        dependencies: prerequisites.filter((p) => this.build.targets.has(p)),
        name,
        target,
      });
      log(`Planned ${name} after [${prerequisites.join(", ")}]`);
    };

    for (const goal of requested) {
      visit(goal);
    }

    log("Plan:", steps.map((step) => step.name));
    log("=== End planning ===");

    return { goals: requested, graph, steps };
  }

  private defaultGoals(): string[] {
    if (!this.build.defaultGoal) {
      throw new NoGoalError();
    }
    return [this.build.defaultGoal];
  }
}

/**
 * Every target that transitively depends on `name` within the plan.
 */
export function dependentsOf(plan: ExecutionPlan, name: string): Set<string> {
  const dependents = new Set<string>();
  const pending = [name];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) {
      break;
    }
    for (const dependent of plan.graph.predecessors(current) || []) {
      if (!dependents.has(dependent)) {
        dependents.add(dependent);
        pending.push(dependent);
      }
    }
  }

  return dependents;
}
