// @scopegate/server - Ordered authorization stages
//
// Each stage is a named Hono middleware. composePipeline() chains them into
// one middleware so the order is fixed in a single place at startup.

import type { Context, MiddlewareHandler, Next } from "hono";
import type { GatewayEnv } from "../types.js";

export interface PipelineStage {
  readonly name: string;
  handle(c: Context<GatewayEnv>, next: Next): Promise<Response | void>;
}

/**
 * Chain `stages` in order. A stage that answers without calling `next`
 * ends the request; nothing after it runs.
 */
export function composePipeline(stages: readonly PipelineStage[]): MiddlewareHandler<GatewayEnv> {
  const names = new Set<string>();
  for (const stage of stages) {
    if (names.has(stage.name)) {
      throw new Error(`Duplicate pipeline stage: ${stage.name}`);
    }
    names.add(stage.name);
  }

  return async (c, next) => {
    const run = async (index: number): Promise<void> => {
      const stage = stages[index];
      if (!stage) {
        await next();
        return;
      }
      const response = await stage.handle(c, () => run(index + 1));
      if (response instanceof Response) {
        c.res = response;
      }
    };
    await run(0);
  };
}
