import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { MalformedCacheError } from "../errors.ts";
import { JsonRegistry } from "./json-store.ts";

describe("JsonRegistry", () => {
  let dir: string;
  let cachePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "jobgraph-json-"));
    cachePath = join(dir, "cache.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("treats a missing document as an empty registry", () => {
    expect(new JsonRegistry(cachePath).load()).toEqual([]);
  });

  test("creates the document on first append with stable formatting", () => {
    new JsonRegistry(cachePath).append({ inputs: ["a.c"], outputs: ["a.o"], command: "gcc -c a.c -o a.o" });

    const content = readFileSync(cachePath, "utf-8");
    expect(content).toBe(
      [
        "{",
        '  "jobs": [',
        "    {",
        '      "inputs": [',
        '        "a.c"',
        "      ],",
        '      "outputs": [',
        '        "a.o"',
        "      ],",
        '      "command": "gcc -c a.c -o a.o"',
        "    }",
        "  ]",
        "}",
        "",
      ].join("\n")
    );
    expect(readdirSync(dir)).toEqual(["cache.json"]);
  });

  test("creates missing parent directories", () => {
    const nested = join(dir, "nested", "deeper", "cache.json");
    new JsonRegistry(nested).append({ inputs: ["x"], outputs: ["y"], command: "cp x y" });
    expect(new JsonRegistry(nested).load()).toEqual([{ inputs: ["x"], outputs: ["y"], command: "cp x y" }]);
  });

  test("appends across independent instances in call order", () => {
    new JsonRegistry(cachePath).append({ inputs: ["1"], outputs: ["2"], command: "first" });
    new JsonRegistry(cachePath).append({ inputs: ["2"], outputs: ["3"], command: "second" });
    new JsonRegistry(cachePath).append({ inputs: ["3"], outputs: ["4"], command: "third" });

    const commands = new JsonRegistry(cachePath).load().map((job) => job.command);
    expect(commands).toEqual(["first", "second", "third"]);
  });

  test("keeps entries it cannot validate so the compiler can report them", () => {
    writeFileSync(cachePath, JSON.stringify({ jobs: [{ inputs: ["a"] }] }));
    expect(new JsonRegistry(cachePath).load()).toEqual([{ inputs: ["a"] }]);
  });

  test("fails fast on a document that is not JSON", () => {
    writeFileSync(cachePath, "{ jobs: ");
    const registry = new JsonRegistry(cachePath);
    expect(() => registry.load()).toThrow(MalformedCacheError);
    expect(() => registry.load()).toThrow(`Job registry at ${cachePath} is malformed: not valid JSON`);
  });

  test.each([
    ["a bare array", "[]"],
    ["a non-array jobs field", '{"jobs": {}}'],
    ["a missing jobs field", '{"tasks": []}'],
    ["a non-object entry", '{"jobs": [1]}'],
  ])("fails fast on %s", (_label, content) => {
    writeFileSync(cachePath, content);
    expect(() => new JsonRegistry(cachePath).load()).toThrow(MalformedCacheError);
  });

  test("does not overwrite a malformed document on append", () => {
    writeFileSync(cachePath, "garbage");
    expect(() => new JsonRegistry(cachePath).append({ inputs: ["a"], outputs: ["b"], command: "c" })).toThrow(
      MalformedCacheError
    );
    expect(readFileSync(cachePath, "utf-8")).toBe("garbage");
  });
});
