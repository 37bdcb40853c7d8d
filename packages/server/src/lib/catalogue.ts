// @scopegate/server - Tool catalogue loading
//
// The catalogue names every tool behind the upstream gateway and the scopes
// each one needs. It is read once at startup.

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ToolDescriptor } from "@scopegate/core";

const catalogueSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string().min(1),
      requiredScopes: z.array(z.string().min(1)).optional(),
    }),
  ),
});

export class CatalogueError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CatalogueError";
  }
}

/**
 * Validate a parsed catalogue document. Tool names must be unique.
 */
export function parseToolCatalogue(document: unknown): ToolDescriptor[] {
  const result = catalogueSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new CatalogueError(`Invalid tool catalogue: ${issues.join("; ")}`);
  }

  const seen = new Set<string>();
  for (const tool of result.data.tools) {
    if (seen.has(tool.name)) {
      throw new CatalogueError(`Duplicate tool in catalogue: ${tool.name}`);
    }
    seen.add(tool.name);
  }
  return result.data.tools;
}

export function loadToolCatalogue(path: string): ToolDescriptor[] {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (err) {
    throw new CatalogueError(`Cannot read tool catalogue at ${path}`, { cause: err });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new CatalogueError(`Tool catalogue at ${path} is not valid JSON`, { cause: err });
  }
  return parseToolCatalogue(document);
}
