import { ConfigError } from "../errors.js";
import type { Task } from "../tasks/types.js";
import { GOALS, isGoal, type Goal, type HostGroup } from "./goals.js";

export type PlanStep = {
  index: number;
  group: HostGroup;
  tasks: readonly Task[];
};

export type ExecutionPlan = {
  goal: Goal;
  steps: readonly PlanStep[];
};

type Entry = { group: HostGroup; tasks: Task[] };

export interface GoalRegistration {
  on(group: HostGroup, tasks: readonly Task[]): GoalRegistration;
}

/**
 * Goal → ordered (HostGroup, Task list) entries. Registration is explicit and
 * additive; a registration for the group the goal's last entry already targets
 * extends that entry, anything else appends a new step.
 */
export class TaskRegistry {
  private entries = new Map<Goal, Entry[]>();

  register(goal: Goal, group: HostGroup, tasks: readonly Task[]): this {
    if (!isGoal(goal)) {
      throw new ConfigError("INVALID_REGISTRATION", `Unknown goal "${String(goal)}"`);
    }
    if (tasks.length === 0) {
      throw new ConfigError("INVALID_REGISTRATION", `Empty task list for ${goal}/${group}`);
    }
    for (const task of tasks) {
      if (!task.groups.includes(group)) {
        throw new ConfigError(
          "INVALID_REGISTRATION",
          `Task "${task.name}" does not target group "${group}" (targets: ${task.groups.join(", ")})`,
        );
      }
    }

    const list = this.entries.get(goal) ?? [];
    const last = list.at(-1);
    if (last && last.group === group) {
      last.tasks.push(...tasks);
    } else {
      list.push({ group, tasks: [...tasks] });
    }
    this.entries.set(goal, list);
    return this;
  }

  /** Shorthand for several registrations under one goal. */
  goal(goal: Goal): GoalRegistration {
    const builder: GoalRegistration = {
      on: (group: HostGroup, tasks: readonly Task[]) => {
        this.register(goal, group, tasks);
        return builder;
      },
    };
    return builder;
  }

  has(goal: string): boolean {
    return isGoal(goal) && this.entries.has(goal);
  }

  /** Registered goals, in declaration order of the goal set. */
  goals(): Goal[] {
    return GOALS.filter((g) => this.entries.has(g));
  }

  resolve(goal: string): ExecutionPlan {
    const list = isGoal(goal) ? this.entries.get(goal) : undefined;
    if (!isGoal(goal) || !list) {
      const known = this.goals();
      throw new ConfigError(
        "UNKNOWN_GOAL",
        `Goal "${goal}" is not defined in the registry (known: ${known.join(", ") || "none"})`,
      );
    }
    const steps = list.map((entry, index) =>
      Object.freeze({ index, group: entry.group, tasks: Object.freeze([...entry.tasks]) }),
    );
    return Object.freeze({ goal, steps: Object.freeze(steps) });
  }
}

export function defineRegistry(build: (registry: TaskRegistry) => void): TaskRegistry {
  const registry = new TaskRegistry();
  build(registry);
  return registry;
}
