// @scopegate/server - Repository access facts over GraphQL
//
// Backs the lockdown cache: one query answers who the viewer is, whether the
// repository is private, and the actor's collaborator permission.

import { z } from "zod";
import { AccessQueryError, type RepoAccessInfo, type RepoAccessQuery } from "@scopegate/core";
import type { FetchFn } from "./scope-fetcher.js";

export const REPO_ACCESS_QUERY = `query RepoAccess($owner: String!, $name: String!, $username: String!) {
  viewer { login }
  repository(owner: $owner, name: $name) {
    isPrivate
    collaborators(query: $username, first: 1) {
      edges { permission node { login } }
    }
  }
}`;

const PUSH_PERMISSIONS = new Set(["WRITE", "MAINTAIN", "ADMIN"]);

const responseSchema = z.object({
  data: z
    .object({
      viewer: z.object({ login: z.string() }),
      repository: z
        .object({
          isPrivate: z.boolean(),
          collaborators: z
            .object({
              edges: z
                .array(
                  z.object({
                    permission: z.string(),
                    node: z.object({ login: z.string() }),
                  }),
                )
                .nullable(),
            })
            .nullable(),
        })
        .nullable(),
    })
    .nullable()
    .optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export interface AccessQueryOptions {
  graphqlUrl: string;
  /** Credential used for the query */
  token: string;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

/**
 * True when the first collaborator edge matching `actor` (case-insensitive)
 * has write, maintain or admin permission.
 */
export function hasPushPermission(
  edges: ReadonlyArray<{ permission: string; node: { login: string } }>,
  actor: string,
): boolean {
  const wanted = actor.toLowerCase();
  const edge = edges.find((e) => e.node.login.toLowerCase() === wanted);
  return edge !== undefined && PUSH_PERMISSIONS.has(edge.permission);
}

export function createRepoAccessQuery(options: AccessQueryOptions): RepoAccessQuery {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? 10_000;

  return async (actor, owner, repo, signal) => {
    const timeout = AbortSignal.timeout(timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetchImpl(options.graphqlUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${options.token}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          query: REPO_ACCESS_QUERY,
          variables: { owner, name: repo, username: actor },
        }),
        signal: combined,
      });
    } catch (err) {
      throw new AccessQueryError(err instanceof Error ? err.message : String(err), err);
    }

    if (!response.ok) {
      throw new AccessQueryError(`unexpected status code: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new AccessQueryError("malformed response", err);
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AccessQueryError("malformed response", parsed.error);
    }

    const { data, errors } = parsed.data;
    if (errors && errors.length > 0) {
      throw new AccessQueryError(errors.map((e) => e.message).join("; "));
    }
    if (!data?.repository) {
      throw new AccessQueryError(`repository ${owner}/${repo} not found`);
    }

    const info: RepoAccessInfo = {
      isPrivate: data.repository.isPrivate,
      hasPushAccess: hasPushPermission(data.repository.collaborators?.edges ?? [], actor),
      viewerLogin: data.viewer.login,
    };
    return info;
  };
}
