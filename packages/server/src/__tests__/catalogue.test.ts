import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OperationScopeIndex } from "@scopegate/core";
import { CatalogueError, loadToolCatalogue, parseToolCatalogue } from "../lib/catalogue.js";
import { DEFAULT_TOOLS_FILE } from "../config.js";

describe("parseToolCatalogue", () => {
  it("accepts tools with and without scope requirements", () => {
    const tools = parseToolCatalogue({
      tools: [
        { name: "get_me" },
        { name: "create_issue", requiredScopes: ["repo"] },
      ],
    });
    expect(tools).toEqual([
      { name: "get_me" },
      { name: "create_issue", requiredScopes: ["repo"] },
    ]);
  });

  it("rejects duplicate names", () => {
    expect(() => parseToolCatalogue({ tools: [{ name: "get_me" }, { name: "get_me" }] })).toThrow(
      "Duplicate tool in catalogue: get_me",
    );
  });

  it("names the offending field", () => {
    expect(() => parseToolCatalogue({ tools: [{ requiredScopes: ["repo"] }] })).toThrow(
      /^Invalid tool catalogue: tools\.0\.name: /,
    );
  });

  it("rejects a document without a tool list", () => {
    expect(() => parseToolCatalogue({ tool: [] })).toThrow(CatalogueError);
  });
});

describe("loadToolCatalogue", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "scopegate-catalogue-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled catalogue", () => {
    const tools = loadToolCatalogue(DEFAULT_TOOLS_FILE);

    expect(tools).toHaveLength(42);
    expect(tools.find((t) => t.name === "get_me")).toEqual({ name: "get_me" });
    expect(tools.find((t) => t.name === "list_notifications")?.requiredScopes).toEqual(["notifications"]);

    const index = OperationScopeIndex.fromCatalogue(tools);
    expect(index.lookup("get_me")).toBeUndefined();
    expect(index.lookup("list_notifications")?.requiredScopes).toEqual(["notifications"]);
  });

  it("reports a missing file", () => {
    const path = join(dir, "missing.json");
    expect(() => loadToolCatalogue(path)).toThrow(`Cannot read tool catalogue at ${path}`);
  });

  it("reports invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ tools: ");
    expect(() => loadToolCatalogue(path)).toThrow(`Tool catalogue at ${path} is not valid JSON`);
  });
});
