import { describe, it, expect } from "vitest";
import { isAbortError } from "../errors.js";
import { hangUntilAborted } from "../testing.js";
import { DependencySkipError, TaskGraph, type TaskDefinition } from "./task-graph.js";

type Name = "a" | "b" | "c";

function task(name: Name, dependencies: Name[], run: TaskDefinition<Name>["run"]): TaskDefinition<Name> {
  return { name, dependencies, run };
}

describe("TaskGraph", () => {
  it("runs independent tasks concurrently and dependents after them", async () => {
    const log: string[] = [];
    const step = (name: Name) => async () => {
      log.push(`${name}:start`);
      await Promise.resolve();
      log.push(`${name}:end`);
    };
    const graph = new TaskGraph<Name>([task("a", [], step("a")), task("b", [], step("b")), task("c", ["a", "b"], step("c"))]);

    await graph.execute(new AbortController().signal);

    expect(log).toEqual(["a:start", "b:start", "a:end", "b:end", "c:start", "c:end"]);
    expect(graph.snapshot()).toEqual([
      { name: "a", state: "done", dependencies: [] },
      { name: "b", state: "done", dependencies: [] },
      { name: "c", state: "done", dependencies: ["a", "b"] },
    ]);
  });

  it("fails dependents of a failed task without running them", async () => {
    let ranC = false;
    const ended: Array<[Name, string]> = [];
    const graph = new TaskGraph<Name>([
      task("a", [], async () => {
        throw new Error("search exploded");
      }),
      task("b", [], async () => {}),
      task("c", ["a", "b"], async () => {
        ranC = true;
      }),
    ]);

    await graph.execute(new AbortController().signal, { onEnd: (name, state) => ended.push([name, state]) });

    expect(ranC).toBe(false);
    expect(graph.state("a")).toBe("failed");
    expect(graph.state("b")).toBe("done");
    expect(graph.state("c")).toBe("failed");
    expect(graph.error("c")).toBeInstanceOf(DependencySkipError);
    expect(String(graph.error("c"))).toBe('DependencySkipError: Skipped "c": required step(s) failed: a');
    expect(ended).toContainEqual(["c", "failed"]);
    expect(ended).toHaveLength(3);
  });

  it("reports tasks that become ready", () => {
    const graph = new TaskGraph<Name>([task("a", [], async () => {}), task("c", ["a"], async () => {})]);
    expect(graph.ready()).toEqual(["a"]);
  });

  it("rejects cycles, unknown dependencies and duplicates", () => {
    expect(() => new TaskGraph<Name>([task("a", ["b"], async () => {}), task("b", ["a"], async () => {})])).toThrow(
      "Task dependency cycle: a → b → a",
    );
    expect(() => new TaskGraph<Name>([task("a", ["c"], async () => {})])).toThrow('Task "a" depends on unknown task "c"');
    expect(() => new TaskGraph<Name>([task("a", [], async () => {}), task("a", [], async () => {})])).toThrow(
      "Duplicate task: a",
    );
  });

  it("rejects with an AbortError when cancelled", async () => {
    const controller = new AbortController();
    const graph = new TaskGraph<Name>([task("a", [], (signal) => hangUntilAborted(signal))]);

    const pending = graph.execute(controller.signal);
    controller.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
  });
});
