import {
  Helper,
  Leader,
  MemoryTaskStore,
  StaticTokenStore,
  createLogger,
  type DeploymentConfig,
  type HelperClient,
  type Logger,
} from "@tally/aggregator";
import { HttpHelperClient } from "./httpHelperClient.js";

/**
   Builds the role a deployment file names. A Leader reaches its Helper
   over HTTP unless another client is given.
*/
export function buildRole(
  config: DeploymentConfig,
  helper: HelperClient = new HttpHelperClient(),
): Leader | Helper {
  const options = {
    global: config.global,
    tokens: new StaticTokenStore(config.tokens, config.tokens.tasks),
    hpkeReceivers: config.hpkeReceivers,
    tasks: new MemoryTaskStore(config.tasks),
    taskprov: config.taskprov,
  };

  if (config.role === "leader") {
    return new Leader({
      ...options,
      helper,
      logger: createLogger("tally:leader", config.logLevel),
    });
  }
  return new Helper({
    ...options,
    logger: createLogger("tally:helper", config.logLevel),
  });
}

export interface JobCounts {
  aggregated: number;
  collected: number;
  evictedCollectJobs: number;
  evictedReplaySets: number;
}

/** One pass of a role's background work. */
export async function runJobs(role: Leader | Helper): Promise<JobCounts> {
  if (role instanceof Leader) {
    return {
      aggregated: await role.runAggregationJobs(),
      collected: await role.runPendingCollectJobs(),
      evictedCollectJobs: await role.evictCollectJobs(),
      evictedReplaySets: await role.evictReplaySets(),
    };
  }
  return {
    aggregated: 0,
    collected: 0,
    evictedCollectJobs: 0,
    evictedReplaySets: await role.evictReplaySets(),
  };
}

/**
   Runs a pass every `intervalSeconds`, each starting after the last
   one settles. Call the returned function to stop.
*/
export function startJobs(
  role: Leader | Helper,
  intervalSeconds: number,
  logger: Logger,
): () => void {
  let stopped = false;
  let timer: NodeJS.Timeout | undefined;

  const tick = () => {
    void runJobs(role)
      .then(
        (counts) => logger.debug("job pass finished", counts),
        (error: unknown) => logger.error("job pass failed", error),
      )
      .finally(() => {
        if (!stopped) timer = setTimeout(tick, intervalSeconds * 1000);
      });
  };
  timer = setTimeout(tick, intervalSeconds * 1000);

  return () => {
    stopped = true;
    clearTimeout(timer);
  };
}
