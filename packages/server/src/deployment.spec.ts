import assert from "assert";
import {
  Helper,
  Leader,
  LocalHelperClient,
  type DeploymentConfig,
} from "@tally/aggregator";
import {
  LEADER_TOKEN,
  testDeployment,
  testGlobalConfig,
  testReport,
  testTask,
  uploadRequest,
  type TestDeployment,
} from "@tally/aggregator/testing";
import { HpkeReceiverConfig } from "@tally/dap";
import { buildRole, runJobs } from "./deployment.js";

async function deploymentConfig(
  role: DeploymentConfig["role"],
): Promise<DeploymentConfig> {
  const collector = await HpkeReceiverConfig.generate(9);
  return {
    role,
    port: 0,
    logLevel: "silent",
    jobInterval: 5,
    global: testGlobalConfig(),
    tasks: [testTask(collector, 2_000_000_000, { type: "timeInterval" })],
    tokens: { leader: LEADER_TOKEN, tasks: {} },
    hpkeReceivers: [await HpkeReceiverConfig.generate(4)],
  };
}

describe("buildRole", () => {
  it("builds a helper that knows the configured tasks", async () => {
    const config = await deploymentConfig("helper");
    const role = buildRole(config);

    assert(role instanceof Helper);
    const [task] = config.tasks;
    assert.strictEqual(await role.getTask(task.taskId), task);
    assert.equal(role.hpkeConfigFor().id, 4);
  });

  it("builds a leader over the given helper client", async () => {
    const t = await testDeployment();
    const role = buildRole(
      await deploymentConfig("leader"),
      new LocalHelperClient(t.helper),
    );
    assert(role instanceof Leader);
  });
});

describe("runJobs", () => {
  let t: TestDeployment;

  beforeEach(async () => {
    t = await testDeployment({ replayRetention: 0 });
  });

  it("aggregates and evicts for a leader", async () => {
    await t.leader.upload(
      uploadRequest(await testReport(t, t.timeIntervalTask.taskId)),
    );

    assert.deepEqual(await runJobs(t.leader), {
      aggregated: 1,
      collected: 0,
      evictedCollectJobs: 0,
      evictedReplaySets: 1,
    });
  });

  it("only evicts for a helper", async () => {
    assert.deepEqual(await runJobs(t.helper), {
      aggregated: 0,
      collected: 0,
      evictedCollectJobs: 0,
      evictedReplaySets: 1,
    });
  });
});
