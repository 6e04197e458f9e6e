export { DapAggregator } from "./aggregator.js";
export type {
  AggregatorOptions,
  OutputShareEntry,
  PrepareInitResult,
} from "./aggregator.js";
export { Leader } from "./leader.js";
export type {
  AggContinueStep,
  AggInitStep,
  LeaderOptions,
  LeaderState,
  LeaderUncommitted,
} from "./leader.js";
export { Helper } from "./helper.js";
export type { HelperOptions } from "./helper.js";
export { LocalHelperClient } from "./localHelperClient.js";
export type { DapRequest, DapResponse, HelperClient } from "./request.js";
export { AggregateShare } from "./aggregateShare.js";
export { HelperReportState, HelperState } from "./helperState.js";
export { StaticTokenStore, tokenMatches } from "./auth.js";
export type { BearerToken, TaskTokens, TokenStore } from "./auth.js";
export { TaskConfig, bucketKey, buildVdaf } from "./task.js";
export type { BatchBucket, TaskConfigParameters, TaskVdaf } from "./task.js";
export {
  deploymentConfigSchema,
  globalConfigSchema,
  hpkeConfigSchema,
  loadDeploymentConfig,
  parseGlobalConfig,
  parseTaskConfigs,
  taskConfigSchema,
} from "./config.js";
export type {
  DeploymentConfig,
  GlobalConfig,
  TaskprovSettings,
} from "./config.js";
export { deriveVerifyKey, taskFromTaskprov } from "./taskprov.js";
export {
  MemoryAggregateStore,
  MemoryCollectJobStore,
  MemoryHelperStateStore,
  MemoryReportStore,
  MemoryTaskStore,
} from "./memory.js";
export type {
  AggregateStore,
  CollectJob,
  CollectJobStore,
  HelperStateStore,
  PendingCollectJob,
  ReportGroup,
  ReportStore,
  TaskStore,
} from "./storage.js";
export { createLogger } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
