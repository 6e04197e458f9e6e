import { Buffer } from "buffer";
import { hkdfSha256, sha256 } from "@tally/common";
import {
  DapAbort,
  Parser,
  TaskprovConfig,
  computeTaskId,
  type ReportMetadata,
  type TaskId,
} from "@tally/dap";
import type { TaskprovSettings } from "./config.js";
import { TaskConfig, buildVdaf } from "./task.js";

const VERIFY_KEY_SALT_LABEL = "dap-taskprov";

/**
   Derives the verify key both aggregators compute independently for a
   taskprov task: HKDF-SHA256 over the deployment's shared secret, with
   the task ID as info.
*/
export async function deriveVerifyKey(
  verifyKeyInit: Buffer,
  taskId: TaskId,
  length: number,
): Promise<Buffer> {
  const salt = await sha256(Buffer.from(VERIFY_KEY_SALT_LABEL, "ascii"));
  return Buffer.from(
    await hkdfSha256(verifyKeyInit, salt, taskId.encode(), length),
  );
}

/**
   Builds the configuration of `taskId` from the taskprov extension on
   `metadata`. Resolves to undefined when the report carries none.
*/
export async function taskFromTaskprov(
  taskId: TaskId,
  metadata: ReportMetadata,
  settings: TaskprovSettings,
  version: string,
): Promise<TaskConfig | undefined> {
  const payload = metadata.taskprovPayload();
  if (!payload) return undefined;

  if (!(await computeTaskId(payload)).equals(taskId)) {
    throw new DapAbort(
      "unrecognizedTask",
      "task ID does not match the taskprov payload",
      taskId,
    );
  }

  try {
    const definition = Parser.complete(TaskprovConfig, payload);
    if (definition.aggregatorEndpoints.length !== 2) {
      throw new Error("expected exactly two aggregator endpoints");
    }
    const [leader, helper] = definition.aggregatorEndpoints;
    const { queryConfig } = definition;
    const vdaf = definition.vdafConfig.vdaf;

    return new TaskConfig({
      taskId,
      version,
      leaderUrl: leader.url,
      helperUrl: helper.url,
      collectorHpkeConfig: settings.collectorHpkeConfig,
      timePrecision: queryConfig.timePrecision,
      expiration: definition.taskExpiration,
      minBatchSize: queryConfig.minBatchSize,
      query: queryConfig.query,
      vdaf,
      verifyKey: await deriveVerifyKey(
        settings.verifyKeyInit,
        taskId,
        buildVdaf(vdaf).verifyKeySize,
      ),
    });
  } catch (error) {
    throw new DapAbort(
      "unrecognizedMessage",
      `invalid taskprov payload: ${String(error)}`,
      taskId,
    );
  }
}
