import assert from "assert";
import { Buffer } from "buffer";
import {
  DAP_VERSION,
  Extension,
  HpkeReceiverConfig,
  ReportId,
  ReportMetadata,
  TaskId,
  TaskprovConfig,
  TaskprovQueryConfig,
  TaskprovVdafConfig,
  UrlBytes,
  computeTaskId,
} from "@tally/dap";
import type { TaskprovSettings } from "./config.js";
import { deriveVerifyKey, taskFromTaskprov } from "./taskprov.js";

function definition(endpoints: string[]): TaskprovConfig {
  return new TaskprovConfig(
    Buffer.from("test task"),
    endpoints.map((url) => new UrlBytes(url)),
    new TaskprovQueryConfig(60, 1, 5, { type: "timeInterval" }),
    2_000_000_000,
    new TaskprovVdafConfig({ type: "sum", bits: 16 }),
  );
}

function metadataWith(payload: Buffer): ReportMetadata {
  return new ReportMetadata(ReportId.random(), 1_000_000_020, [
    Extension.taskprov(payload),
  ]);
}

describe("taskprov", () => {
  let settings: TaskprovSettings;

  before(async () => {
    settings = {
      verifyKeyInit: Buffer.alloc(32, 4),
      collectorHpkeConfig: (await HpkeReceiverConfig.generate(9)).config,
    };
  });

  it("derives a verify key per task", async () => {
    const { verifyKeyInit } = settings;
    const a = await deriveVerifyKey(verifyKeyInit, TaskId.random(), 16);
    const b = await deriveVerifyKey(verifyKeyInit, TaskId.random(), 16);
    assert.equal(a.length, 16);
    assert(!a.equals(b));
  });

  it("builds the task a report describes", async () => {
    const payload = definition([
      "https://leader.example/",
      "https://helper.example/dap",
    ]).encode();
    const taskId = await computeTaskId(payload);

    const task = await taskFromTaskprov(
      taskId,
      metadataWith(payload),
      settings,
      DAP_VERSION,
    );
    assert(task);
    assert(task.taskId.equals(taskId));
    assert.equal(task.leaderUrl.toString(), "https://leader.example/");
    assert.equal(task.helperUrl.toString(), "https://helper.example/dap/");
    assert.equal(task.timePrecision, 60);
    assert.equal(task.minBatchSize, 5);
    assert.equal(task.expiration, 2_000_000_000);
    assert.deepEqual(task.vdafConfig, { type: "sum", bits: 16 });
    assert.strictEqual(task.collectorHpkeConfig, settings.collectorHpkeConfig);
    assert.deepEqual(
      task.verifyKey,
      await deriveVerifyKey(settings.verifyKeyInit, taskId, 16),
    );
  });

  it("ignores reports without the extension", async () => {
    const metadata = new ReportMetadata(ReportId.random(), 0);
    assert.equal(
      await taskFromTaskprov(TaskId.random(), metadata, settings, DAP_VERSION),
      undefined,
    );
  });

  it("refuses a payload that does not hash to the task ID", async () => {
    const payload = definition(["https://a.example/", "https://b.example/"])
      .encode();
    await assert.rejects(
      taskFromTaskprov(
        TaskId.random(),
        metadataWith(payload),
        settings,
        DAP_VERSION,
      ),
      {
        kind: "unrecognizedTask",
        detail: "task ID does not match the taskprov payload",
      },
    );
  });

  it("refuses a definition without exactly two aggregators", async () => {
    const payload = definition(["https://a.example/"]).encode();
    await assert.rejects(
      taskFromTaskprov(
        await computeTaskId(payload),
        metadataWith(payload),
        settings,
        DAP_VERSION,
      ),
      { kind: "unrecognizedMessage" },
    );
  });

  it("refuses a malformed payload", async () => {
    const payload = Buffer.from([1, 2, 3]);
    await assert.rejects(
      taskFromTaskprov(
        await computeTaskId(payload),
        metadataWith(payload),
        settings,
        DAP_VERSION,
      ),
      { kind: "unrecognizedMessage" },
    );
  });
});
