import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { candidateFiles, candidateStems, findProjectRoot, moduleNameHint } from "../src/core/graph/paths.js";
import { findCycle, toposort, wouldCreateCycle } from "../src/core/graph/toposort.js";

import { createBlueprintTree, removeTree } from "./fixtures.js";

describe("toposort", () => {
  it("orders dependencies before dependents", () => {
    const result = toposort([
      { id: "api", dependencies: ["models"] },
      { id: "models", dependencies: ["core"] },
      { id: "core", dependencies: [] }
    ]);

    expect(result).toEqual({ order: ["core", "models", "api"], cycles: [] });
  });

  it("breaks ties by input position", () => {
    expect(
      toposort([
        { id: "x", dependencies: ["z"] },
        { id: "y", dependencies: [] },
        { id: "z", dependencies: [] }
      ]).order
    ).toEqual(["y", "z", "x"]);
  });

  it("ignores unknown, repeated and self dependencies", () => {
    expect(
      toposort([
        { id: "a", dependencies: ["a", "ghost", "b", "b"] },
        { id: "b", dependencies: [] }
      ])
    ).toEqual({ order: ["b", "a"], cycles: [] });
  });

  it("records a cycle and releases the earliest remaining module", () => {
    const result = toposort([
      { id: "a", dependencies: ["b"] },
      { id: "b", dependencies: ["a"] },
      { id: "c", dependencies: ["a"] }
    ]);

    expect(result.cycles).toEqual([["a", "b", "a"]]);
    expect(result.order).toEqual(["a", "b", "c"]);
  });

  it("returns an empty order for no input", () => {
    expect(toposort([])).toEqual({ order: [], cycles: [] });
  });
});

describe("findCycle and wouldCreateCycle", () => {
  it("finds nothing in an acyclic graph", () => {
    const items = [
      { id: "a", dependencies: ["b"] },
      { id: "b", dependencies: [] }
    ];
    expect(findCycle(items, new Set(["a", "b"]))).toBeNull();
  });

  it("detects an edge that would close a cycle", () => {
    const adjacency = new Map([
      ["a", ["b"]],
      ["b", ["c"]],
      ["c", []]
    ]);

    expect(wouldCreateCycle(adjacency, "c", "a")).toBe(true);
    expect(wouldCreateCycle(adjacency, "a", "c")).toBe(false);
    expect(wouldCreateCycle(adjacency, "b", "b")).toBe(true);
  });
});

describe("reference path candidates", () => {
  it("resolves dotted forms against the referencing directory, then the base directory", () => {
    expect(candidateStems("@.models.user", "/p/api", "/p")).toEqual(["/p/api/models/user", "/p/models/user"]);
    expect(candidateStems("@..core.db", "/p/api/v1", "/p")).toEqual(["/p/api/core/db", "/p/core/db"]);
  });

  it("resolves ./ and ../ forms against the referencing directory only", () => {
    expect(candidateStems("@./services/auth", "/p/api", "/p")).toEqual(["/p/api/services/auth"]);
    expect(candidateStems("../core/db.md", "/p/api", "/p")).toEqual(["/p/core/db"]);
  });

  it("resolves plain forms against the base directory", () => {
    expect(candidateStems("models.user", "/p/api", "/p")).toEqual(["/p/models/user"]);
    expect(candidateStems("models/user", "/p/api", "/p")).toEqual(["/p/models/user"]);
    expect(candidateStems("@", "/p/api", "/p")).toEqual([]);
  });

  it("tries <stem>.md before <stem>/<basename>.md", () => {
    expect(candidateFiles("@.models.user", "/p", "/p")).toEqual(["/p/models/user.md", "/p/models/user/user.md"]);
  });

  it("derives a module name hint", () => {
    expect(moduleNameHint("@../core/db")).toBe("core.db");
    expect(moduleNameHint("@.models.user.md")).toBe("models.user");
  });
});

describe("findProjectRoot", () => {
  const roots: string[] = [];

  afterEach(() => {
    for (const root of roots.splice(0)) removeTree(root);
  });

  it("climbs to the nearest directory with a project marker", () => {
    const root = createBlueprintTree({
      "blueprints.config.json": "{}\n",
      "api/v1/tasks.md": "# api.v1.tasks\n"
    });
    roots.push(root);

    expect(findProjectRoot(join(root, "api", "v1"))).toBe(root);
    expect(findProjectRoot(root)).toBe(root);
  });

  it("prefers a nested marker over an outer one", () => {
    const root = createBlueprintTree({
      "package.json": "{}\n",
      "service/main.md": "# service\n",
      "service/api/tasks.md": "# api.tasks\n"
    });
    roots.push(root);

    expect(findProjectRoot(join(root, "service", "api"))).toBe(join(root, "service"));
  });
});
