import { abortError, isAbortError } from "../errors.js";
import type { TaskNode, TaskState } from "../types.js";

export interface TaskDefinition<TName extends string> {
  name: TName;
  dependencies: readonly TName[];
  run: (signal: AbortSignal) => Promise<void>;
}

export interface TaskHooks<TName extends string> {
  onStart?: (name: TName) => void;
  onEnd?: (name: TName, state: Extract<TaskState, "done" | "failed">, error?: unknown) => void;
}

export class DependencySkipError extends Error {
  constructor(readonly task: string, readonly failedDependencies: readonly string[]) {
    super(`Skipped "${task}": required step(s) failed: ${failedDependencies.join(", ")}`);
    this.name = "DependencySkipError";
  }
}

/**
 * Dependency graph of named tasks.
 *
 * A pending node starts as soon as every dependency is `done`; ready nodes run
 * concurrently. A node whose task rejects becomes `failed`, and every pending
 * node depending on it becomes `failed` without running.
 */
export class TaskGraph<TName extends string> {
  private readonly nodes = new Map<TName, TaskNode<TName>>();
  private readonly tasks = new Map<TName, TaskDefinition<TName>>();
  private readonly errors = new Map<TName, unknown>();

  constructor(definitions: readonly TaskDefinition<TName>[]) {
    for (const def of definitions) {
      if (this.tasks.has(def.name)) throw new Error(`Duplicate task: ${def.name}`);
      this.tasks.set(def.name, def);
      this.nodes.set(def.name, { name: def.name, dependencies: new Set(def.dependencies), state: "pending" });
    }
    for (const def of definitions) {
      for (const dep of def.dependencies) {
        if (!this.tasks.has(dep)) throw new Error(`Task "${def.name}" depends on unknown task "${dep}"`);
      }
    }
    this.assertAcyclic();
  }

  private assertAcyclic(): void {
    const visiting = new Set<TName>();
    const visited = new Set<TName>();
    const visit = (name: TName, path: TName[]) => {
      if (visited.has(name)) return;
      if (visiting.has(name)) throw new Error(`Task dependency cycle: ${[...path, name].join(" → ")}`);
      visiting.add(name);
      for (const dep of this.nodes.get(name)?.dependencies ?? []) visit(dep, [...path, name]);
      visiting.delete(name);
      visited.add(name);
    };
    for (const name of this.nodes.keys()) visit(name, []);
  }

  state(name: TName): TaskState | undefined {
    return this.nodes.get(name)?.state;
  }

  error(name: TName): unknown {
    return this.errors.get(name);
  }

  snapshot(): Array<{ name: TName; state: TaskState; dependencies: TName[] }> {
    return [...this.nodes.values()].map((n) => ({ name: n.name, state: n.state, dependencies: [...n.dependencies] }));
  }

  /** Pending nodes whose dependencies are all done. */
  ready(): TName[] {
    return [...this.nodes.values()]
      .filter((n) => n.state === "pending" && [...n.dependencies].every((d) => this.state(d) === "done"))
      .map((n) => n.name);
  }

  private failBlocked(hooks: TaskHooks<TName>): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const node of this.nodes.values()) {
        if (node.state !== "pending") continue;
        const failedDeps = [...node.dependencies].filter((d) => this.state(d) === "failed");
        if (failedDeps.length === 0) continue;
        const err = new DependencySkipError(node.name, failedDeps);
        node.state = "failed";
        this.errors.set(node.name, err);
        hooks.onEnd?.(node.name, "failed", err);
        changed = true;
      }
    }
  }

  private start(name: TName, signal: AbortSignal, hooks: TaskHooks<TName>): Promise<void> {
    const node = this.nodes.get(name);
    const task = this.tasks.get(name);
    if (!node || !task) return Promise.resolve();
    node.state = "running";
    hooks.onStart?.(name);
    return task.run(signal).then(
      () => {
        node.state = "done";
        hooks.onEnd?.(name, "done");
      },
      (err: unknown) => {
        node.state = "failed";
        this.errors.set(name, err);
        if (!isAbortError(err)) hooks.onEnd?.(name, "failed", err);
      },
    );
  }

  /**
   * Runs every task to a terminal state. Rejects with an AbortError when the
   * signal fires; tasks still in flight are left to observe the same signal.
   */
  async execute(signal: AbortSignal, hooks: TaskHooks<TName> = {}): Promise<void> {
    if (signal.aborted) throw abortError();

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<void>((resolve: () => void) => {
      onAbort = resolve;
      signal.addEventListener("abort", resolve, { once: true });
    });
    const inFlight = new Map<TName, Promise<void>>();

    try {
      while (true) {
        this.failBlocked(hooks);
        for (const name of this.ready()) {
          inFlight.set(name, this.start(name, signal, hooks).finally(() => inFlight.delete(name)));
        }
        if (inFlight.size === 0) break;
        await Promise.race([...inFlight.values(), aborted]);
        if (signal.aborted) throw abortError();
      }
    } finally {
      if (onAbort) signal.removeEventListener("abort", onAbort);
    }
  }
}
