// @scopegate/server - JSON-RPC parse stage
//
// Reads the MCP request body once, up front, so later stages can decide on
// the method and tool name without parsing again. The body is read from a
// clone; the original stays intact for the dispatcher.

import { z } from "zod";
import type { PipelineStage } from "../lib/pipeline.js";
import type { ParsedRequest } from "../types.js";

export const PING_PATH = "/_ping";

const envelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string().min(1),
  params: z
    .object({
      name: z.string().optional(),
      arguments: z.unknown().optional(),
      uri: z.string().optional(),
    })
    .nullish(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Interpret a JSON-RPC body. Returns undefined for anything that is not a
 * well-formed 2.0 request with a method.
 */
export function parseMcpRequestBody(body: string): ParsedRequest | undefined {
  if (body.length === 0) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) return undefined;

  const { method, params } = envelope.data;
  const parsed: ParsedRequest = { method, itemName: "" };

  switch (method) {
    case "tools/call": {
      parsed.itemName = params?.name ?? "";
      const args = params?.arguments;
      if (isRecord(args)) {
        parsed.arguments = args;
        if (typeof args.owner === "string") parsed.owner = args.owner;
        if (typeof args.repo === "string") parsed.repo = args.repo;
      }
      break;
    }
    case "prompts/get":
      parsed.itemName = params?.name ?? "";
      break;
    case "resources/read":
      parsed.itemName = params?.uri ?? "";
      break;
  }

  return parsed;
}

/**
 * Body of the request as text, leaving the original stream unread.
 */
export async function peekBody(request: Request): Promise<string> {
  return request.clone().text();
}

export function requestParseStage(): PipelineStage {
  return {
    name: "request-parse",
    async handle(c, next) {
      c.set("parsedRequest", undefined);

      if (c.req.path !== PING_PATH && c.req.method === "POST") {
        let body: string | undefined;
        try {
          body = await peekBody(c.req.raw);
        } catch (err) {
          c.get("logger").debug({ err }, "request body unreadable; skipping parse");
        }
        if (body !== undefined) {
          c.set("parsedRequest", parseMcpRequestBody(body));
        }
      }

      await next();
    },
  };
}
