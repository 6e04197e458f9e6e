import { Buffer } from "buffer";
import { constantTimeEqual } from "@tally/common";
import type { TaskId } from "@tally/dap";

export type BearerToken = string;

/**
   Resolves the credential a sender must present for a task. The
   Leader presents `leaderToken` to the Helper and the Collector
   presents `collectorToken` to the Leader.
*/
export interface TokenStore {
  leaderToken(taskId?: TaskId): BearerToken | undefined;
  collectorToken(taskId?: TaskId): BearerToken | undefined;
}

export interface TaskTokens {
  leader?: BearerToken;
  collector?: BearerToken;
}

/**
   Deployment-wide tokens with optional per-task overrides, keyed by
   the base64url task ID.
*/
export class StaticTokenStore implements TokenStore {
  constructor(
    private readonly defaults: TaskTokens,
    private readonly tasks: Record<string, TaskTokens> = {},
  ) {}

  leaderToken(taskId?: TaskId): BearerToken | undefined {
    return this.lookup(taskId)?.leader ?? this.defaults.leader;
  }

  collectorToken(taskId?: TaskId): BearerToken | undefined {
    return this.lookup(taskId)?.collector ?? this.defaults.collector;
  }

  private lookup(taskId?: TaskId): TaskTokens | undefined {
    return taskId ? this.tasks[taskId.toString()] : undefined;
  }
}

export function tokenMatches(
  expected: BearerToken | undefined,
  presented: BearerToken | undefined,
): boolean {
  if (expected === undefined || presented === undefined) return false;
  return constantTimeEqual(
    Buffer.from(expected, "utf8"),
    Buffer.from(presented, "utf8"),
  );
}
