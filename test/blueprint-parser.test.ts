import { describe, expect, it } from "vitest";

import { parseBlueprint } from "../src/core/blueprint/parser.js";
import { formatReference, parseReferenceEntry, splitOutsideBrackets } from "../src/core/blueprint/references.js";
import { ParseError } from "../src/core/errors.js";

const STRUCTURED = [
  "# models.user",
  "",
  "User model with persistence helpers.",
  "Second line of description.",
  "",
  "deps: @.core.database[Database, connect as openDb]; @.models.role",
  "notes: validate emails, hash passwords",
  "",
  "class User(BaseModel):",
  "  - id: string",
  "  - email: string",
  "  - async save() -> void",
  "  - toJSON(): Record<string, unknown>",
  "",
  "async findUser(id: string) -> User | null",
  "MAX_USERS: number = 100",
  "type UserId = string",
  "- never log password hashes"
].join("\n");

const NATURAL = [
  "# api.tasks",
  "",
  "Task endpoints for the todo service.",
  "",
  "Dependencies: @.models.task[Task], express, ./auth[requireUser]",
  "- zod - validation",
  "",
  "Requirements:",
  "- list tasks for the current user",
  "- create a task",
  "",
  "Notes: paginate results",
  "",
  "Endpoints:",
  "- GET /tasks"
].join("\n");

describe("parseBlueprint structured documents", () => {
  it("reads the header, description, references and notes", () => {
    const { blueprint, warnings } = parseBlueprint(STRUCTURED, { sourceLocation: "/tmp/models/user.md" });

    expect(warnings).toEqual([]);
    expect(blueprint.moduleName).toBe("models.user");
    expect(blueprint.description).toBe("User model with persistence helpers. Second line of description.");
    expect(blueprint.sourceLocation).toBe("/tmp/models/user.md");
    expect(blueprint.rawText).toBe(STRUCTURED);
    expect(blueprint.references).toEqual([
      {
        targetPath: "@.core.database",
        importedItems: [{ name: "Database" }, { name: "connect", alias: "openDb" }]
      },
      { targetPath: "@.models.role", importedItems: [] }
    ]);
    expect(blueprint.notes).toEqual(["validate emails", "hash passwords", "never log password hashes"]);
  });

  it("extracts classes, functions, constants and type aliases", () => {
    const { blueprint } = parseBlueprint(STRUCTURED);

    expect(blueprint.components).toEqual([
      {
        kind: "class",
        name: "User",
        baseClass: "BaseModel",
        properties: [
          { name: "id", type: "string" },
          { name: "email", type: "string" }
        ],
        methods: [
          { name: "save", params: "", returnType: "void", isAsync: true },
          { name: "toJSON", params: "", returnType: "Record<string, unknown>", isAsync: false }
        ]
      },
      { kind: "function", name: "findUser", params: "id: string", returnType: "User | null", isAsync: true },
      { kind: "constant", name: "MAX_USERS", type: "number", value: "100" },
      { kind: "type-alias", name: "UserId", value: "string" }
    ]);
  });

  it("returns a frozen record", () => {
    const { blueprint } = parseBlueprint(STRUCTURED);

    expect(Object.isFrozen(blueprint)).toBe(true);
    expect(Object.isFrozen(blueprint.references)).toBe(true);
    expect(Object.isFrozen(blueprint.components)).toBe(true);
    expect(Object.isFrozen(blueprint.references[0]?.importedItems)).toBe(true);
  });

  it("accepts the module: header form", () => {
    const { blueprint } = parseBlueprint("\n\n# module: api.tasks\n\nasync listTasks() -> Task[]\n");

    expect(blueprint.moduleName).toBe("api.tasks");
    expect(blueprint.components).toEqual([
      { kind: "function", name: "listTasks", params: "", returnType: "Task[]", isAsync: true }
    ]);
  });

  it("reads a prose line with parentheses as description, not as a signature", () => {
    const { blueprint, warnings } = parseBlueprint(
      "# services.auth\n\nIssues tokens (JWT) for signed-in users.\n\nasync issue(userId: string) -> string\n"
    );

    expect(warnings).toEqual([]);
    expect(blueprint.description).toBe("Issues tokens (JWT) for signed-in users.");
    expect(blueprint.components.map((component) => component.name)).toEqual(["issue"]);
  });

  it("accumulates several deps lines", () => {
    const { blueprint } = parseBlueprint("# app\n\ndeps: @.a\ndeps: @.b[B]\n");

    expect(blueprint.references.map(formatReference)).toEqual(["@.a", "@.b[B]"]);
  });

  it("drops malformed entries with warnings instead of failing", () => {
    const { blueprint, warnings } = parseBlueprint(
      ["# app", "", "deps: @.a[B; @.c", "deps: @.x[1bad]", "broken(a, b"].join("\n")
    );

    expect(blueprint.references).toEqual([{ targetPath: "@.x", importedItems: [] }]);
    expect(blueprint.components).toEqual([]);
    expect(warnings).toEqual([
      'Dropped dependency "@.a[B; @.c": unbalanced item list.',
      'Dropped imported item "1bad" in "@.x[1bad]": expected "Name" or "Name as Alias".',
      'Dropped signature "broken(a, b": unbalanced parentheses.'
    ]);
  });
});

describe("parseBlueprint natural documents", () => {
  it("keeps prose with parentheses as a natural description", () => {
    const { blueprint, warnings } = parseBlueprint(
      "# services.auth\n\nAuthentication (JWT) service for users.\n\nDependencies: @./models/user, bcrypt\n"
    );

    expect(warnings).toEqual([]);
    expect(blueprint.description).toBe("Authentication (JWT) service for users.");
    expect(blueprint.references).toEqual([{ targetPath: "@./models/user", importedItems: [] }]);
    expect(blueprint.externalDependencies).toEqual(["bcrypt"]);
    expect(blueprint.components).toEqual([]);
  });

  it("splits dependency declarations into references and packages", () => {
    const { blueprint, warnings } = parseBlueprint(NATURAL);

    expect(warnings).toEqual([]);
    expect(blueprint.moduleName).toBe("api.tasks");
    expect(blueprint.description).toBe("Task endpoints for the todo service.");
    expect(blueprint.references).toEqual([
      { targetPath: "@.models.task", importedItems: [{ name: "Task" }] },
      { targetPath: "./auth", importedItems: [{ name: "requireUser" }] }
    ]);
    expect(blueprint.externalDependencies).toEqual(["express", "zod"]);
  });

  it("keeps requirements, notes and other sections apart", () => {
    const { blueprint } = parseBlueprint(NATURAL);

    expect(blueprint.requirements).toEqual(["list tasks for the current user", "create a task"]);
    expect(blueprint.notes).toEqual(["paginate results"]);
    expect(blueprint.sections).toEqual({ endpoints: ["GET /tasks"] });
    expect(blueprint.components).toEqual([]);
  });

  it("reads markdown section headers", () => {
    const { blueprint } = parseBlueprint("# app\n\nThe app.\n\n## Dependencies\n- @./models/user[User]\n- express\n");

    expect(blueprint.references).toEqual([{ targetPath: "@./models/user", importedItems: [{ name: "User" }] }]);
    expect(blueprint.externalDependencies).toEqual(["express"]);
  });
});

describe("parseBlueprint header errors", () => {
  it("rejects an empty document", () => {
    expect(() => parseBlueprint("   \n\n")).toThrow(ParseError);
    expect(() => parseBlueprint("")).toThrow('Blueprint is empty; expected a "# module.name" header.');
  });

  it("rejects a document without a module header", () => {
    expect(() => parseBlueprint("Just text\n# models.user", { sourceLocation: "/tmp/x.md" })).toThrow(
      'Blueprint in /tmp/x.md must start with a "# module.name" header, found "Just text".'
    );
  });

  it("rejects an invalid module name", () => {
    expect(() => parseBlueprint("# models..user\n")).toThrow(ParseError);
  });
});

describe("reference entries", () => {
  it("splits outside bracket lists only", () => {
    expect(splitOutsideBrackets("@.a[B, C], express, @.d", ",")).toEqual(["@.a[B, C]", "express", "@.d"]);
  });

  it("parses aliases and renders them back", () => {
    const outcome = parseReferenceEntry("@.models.user[User, Role as UserRole]");

    expect(outcome.warnings).toEqual([]);
    expect(outcome.reference).toEqual({
      targetPath: "@.models.user",
      importedItems: [{ name: "User" }, { name: "Role", alias: "UserRole" }]
    });
    expect(outcome.reference && formatReference(outcome.reference)).toBe("@.models.user[User, Role as UserRole]");
  });

  it("rejects a stray closing bracket", () => {
    expect(parseReferenceEntry("@.models.user]")).toEqual({
      warnings: ['Dropped dependency "@.models.user]": unbalanced "]".']
    });
  });
});
