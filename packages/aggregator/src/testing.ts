import { Buffer } from "buffer";
import {
  AggregateShareAad,
  AggregateShareInfo,
  Client,
  CollectReq,
  DAP_VERSION,
  HpkeReceiverConfig,
  MEDIA_TYPES,
  Role,
  TaskId,
  type CollectResp,
  type Extension,
  type Query,
  type Report,
} from "@tally/dap";
import { Count } from "@tally/vdaf";
import { StaticTokenStore } from "./auth.js";
import type { GlobalConfig, TaskprovSettings } from "./config.js";
import { Helper } from "./helper.js";
import { Leader } from "./leader.js";
import { LocalHelperClient } from "./localHelperClient.js";
import { createLogger } from "./logger.js";
import { MemoryTaskStore } from "./memory.js";
import type { DapRequest, HelperClient } from "./request.js";
import { TaskConfig } from "./task.js";

// Fixtures shared by the specs, published as `@tally/aggregator/testing`.

export const LEADER_TOKEN = "this is a bearer token!";
export const COLLECTOR_TOKEN = "This is a DIFFERENT token.";
export const LEADER_URL = "https://leader.biz/v02/";
export const HELPER_URL = "http://helper.com:8788/v02/";
export const TIME_PRECISION = 3600;

/** 2034 seconds into its hour */
export const NOW = 1_700_001_234;

export function testGlobalConfig(
  overrides: Partial<GlobalConfig> = {},
): GlobalConfig {
  return {
    maxBatchDuration: 360000,
    minBatchIntervalStart: 259200,
    maxBatchIntervalEnd: 259200,
    supportedHpkeKems: [0x20],
    allowTaskprov: true,
    requireHpkeConfigTaskId: true,
    collectJobRetention: null,
    replayRetention: null,
    ...overrides,
  };
}

export function testTask(
  collector: HpkeReceiverConfig,
  expiration: number,
  query: TaskConfig["query"],
): TaskConfig {
  return new TaskConfig({
    taskId: TaskId.random(),
    version: DAP_VERSION,
    leaderUrl: LEADER_URL,
    helperUrl: HELPER_URL,
    collectorHpkeConfig: collector.config,
    timePrecision: TIME_PRECISION,
    expiration,
    minBatchSize: 1,
    query,
    vdaf: { type: "count" },
    verifyKey: Buffer.alloc(16, 7),
  });
}

export interface TestDeployment {
  now: number;
  global: GlobalConfig;
  leader: Leader;
  helper: Helper;
  collector: HpkeReceiverConfig;
  taskprov: TaskprovSettings;
  timeIntervalTask: TaskConfig;
  fixedSizeTask: TaskConfig;
  expiredTask: TaskConfig;
}

/**
   A Leader and Helper wired together in process, sharing three tasks
   and a fixed clock. `helperClient` decides how the Leader reaches the
   Helper.
*/
export async function testDeployment(
  overrides: Partial<GlobalConfig> = {},
  helperClient: (helper: Helper) => HelperClient = (helper) =>
    new LocalHelperClient(helper),
): Promise<TestDeployment> {
  const now = NOW;
  const global = testGlobalConfig(overrides);
  const collector = await HpkeReceiverConfig.generate(23);
  const taskprov: TaskprovSettings = {
    verifyKeyInit: Buffer.alloc(32, 1),
    collectorHpkeConfig: collector.config,
  };

  const timeIntervalTask = testTask(collector, now + 3600, {
    type: "timeInterval",
  });
  const fixedSizeTask = testTask(collector, now + 3600, {
    type: "fixedSize",
    maxBatchSize: 2,
  });
  const expiredTask = testTask(collector, now, { type: "timeInterval" });
  const tasks = [timeIntervalTask, fixedSizeTask, expiredTask];

  const tokens = new StaticTokenStore({
    leader: LEADER_TOKEN,
    collector: COLLECTOR_TOKEN,
  });
  const clock = () => now;

  const helper = new Helper({
    global,
    tokens,
    hpkeReceivers: [await HpkeReceiverConfig.generate(2)],
    tasks: new MemoryTaskStore(tasks),
    taskprov,
    clock,
    logger: createLogger("tally:helper", "silent"),
  });
  const leader = new Leader({
    global,
    tokens,
    hpkeReceivers: [await HpkeReceiverConfig.generate(1)],
    tasks: new MemoryTaskStore(tasks),
    taskprov,
    clock,
    logger: createLogger("tally:leader", "silent"),
    helper: helperClient(helper),
  });

  return {
    now,
    global,
    leader,
    helper,
    collector,
    taskprov,
    timeIntervalTask,
    fixedSizeTask,
    expiredTask,
  };
}

export function testClient(
  t: TestDeployment,
  taskId: TaskId,
  extensions: Extension[] = [],
): Client<boolean> {
  return new Client({
    taskId,
    leader: LEADER_URL,
    helper: HELPER_URL,
    timePrecisionSeconds: TIME_PRECISION,
    vdaf: new Count(),
    extensions,
    hpkeConfigs: {
      leader: t.leader.hpkeConfigFor(),
      helper: t.helper.hpkeConfigFor(),
    },
  });
}

export async function testReport(
  t: TestDeployment,
  taskId: TaskId,
  measurement = true,
  extensions: Extension[] = [],
): Promise<Report> {
  return testClient(t, taskId, extensions).generateReport(measurement, {
    timestamp: new Date(t.now * 1000),
  });
}

export function uploadRequest(
  report: Report,
  version: string = DAP_VERSION,
): DapRequest {
  return {
    version,
    mediaType: MEDIA_TYPES.REPORT,
    taskId: report.taskId,
    payload: report.encode(),
    url: new URL("upload", LEADER_URL),
  };
}

export function collectRequest(
  taskId: TaskId,
  query: Query,
  senderAuth: string | undefined = COLLECTOR_TOKEN,
): DapRequest {
  return {
    version: DAP_VERSION,
    mediaType: MEDIA_TYPES.COLLECT_REQ,
    taskId,
    payload: new CollectReq(taskId, query).encode(),
    url: new URL("collect", LEADER_URL),
    senderAuth,
  };
}

/** A request from the Leader to one of the Helper's endpoints. */
export function helperRequest(
  taskId: TaskId,
  path: "aggregate" | "aggregate_share",
  mediaType: string,
  payload: Buffer,
  senderAuth: string | undefined = LEADER_TOKEN,
): DapRequest {
  return {
    version: DAP_VERSION,
    mediaType,
    taskId,
    payload,
    url: new URL(path, HELPER_URL),
    senderAuth,
  };
}

/** Opens both aggregate shares of a collect result as the Collector. */
export async function unshardCollectResp(
  t: TestDeployment,
  task: TaskConfig,
  query: Query,
  resp: CollectResp,
): Promise<unknown> {
  const aad = new AggregateShareAad(task.taskId, query).encode();
  const shares = await Promise.all(
    resp.encryptedAggregateShares.map(async (ciphertext, i) =>
      task.vdaf.decodeAggregatorShare(
        await t.collector.open(
          ciphertext,
          new AggregateShareInfo(i === 0 ? Role.Leader : Role.Helper).encode(),
          aad,
        ),
      ),
    ),
  );
  return task.vdaf.unshard(shares, resp.reportCount);
}
