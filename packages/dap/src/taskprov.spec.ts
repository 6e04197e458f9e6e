import assert from "assert";
import { Buffer } from "buffer";
import {
  TaskprovConfig,
  TaskprovQueryConfig,
  TaskprovVdafConfig,
  UrlBytes,
  computeTaskId,
} from "./taskprov.js";

function sampleConfig(): TaskprovConfig {
  return new TaskprovConfig(
    Buffer.from("cool task"),
    [
      new UrlBytes("https://leader.example/"),
      new UrlBytes("https://helper.example/"),
    ],
    new TaskprovQueryConfig(3600, 1, 1, {
      type: "fixedSize",
      maxBatchSize: 2,
    }),
    1_700_000_000,
    new TaskprovVdafConfig({ type: "sumVec", length: 3, bits: 4 }),
  );
}

describe("DAP TaskprovConfig", () => {
  it("decodes what it encodes", () => {
    const config = sampleConfig();
    assert.deepEqual(TaskprovConfig.parse(config.encode()), config);
  });

  it("encodes the vdaf config after a dp config of none", () => {
    assert.deepEqual(
      new TaskprovVdafConfig({ type: "sum", bits: 8 }).encode(),
      Buffer.from([1, ...[0, 0, 0, 1], 8]),
    );
  });

  it("rejects an unknown vdaf type", () => {
    assert.throws(
      () => TaskprovVdafConfig.parse(Buffer.from([1, 0, 0, 0, 9])),
      /unknown vdaf type 9/,
    );
  });

  it("rejects a differential privacy mechanism it does not know", () => {
    assert.throws(
      () => TaskprovVdafConfig.parse(Buffer.from([2, 0, 0, 0, 0])),
      /unsupported dp config 2/,
    );
  });

  it("derives the task id from the payload bytes", async () => {
    const payload = sampleConfig().encode();
    const taskId = await computeTaskId(payload);
    assert(taskId.equals(await computeTaskId(Buffer.from(payload))));

    const changed = Buffer.from(payload);
    changed[changed.length - 1] ^= 1;
    assert(!taskId.equals(await computeTaskId(changed)));
  });

  it("hashes the empty payload to the SHA-256 of nothing", async () => {
    assert.equal(
      (await computeTaskId(Buffer.alloc(0))).buffer.toString("hex"),
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });
});
