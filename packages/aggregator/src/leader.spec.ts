import assert from "assert";
import { Buffer } from "buffer";
import {
  AggregateResp,
  AggregationJobId,
  BatchId,
  CollectionJobId,
  DAP_VERSION,
  FixedSizeQuery,
  Interval,
  MEDIA_TYPES,
  QueryType,
  Report,
  TaskId,
  TimeIntervalPartialSelector,
  TimeIntervalQuery,
  Transition,
} from "@tally/dap";
import { LocalHelperClient } from "./localHelperClient.js";
import type { DapRequest, DapResponse, HelperClient } from "./request.js";
import type { TaskConfig } from "./task.js";
import {
  COLLECTOR_TOKEN,
  LEADER_URL,
  collectRequest,
  testDeployment,
  testReport,
  uploadRequest,
  type TestDeployment,
} from "./testing.js";

/** Rejects a set number of calls per method before passing through. */
class UnreliableHelperClient implements HelperClient {
  constructor(
    private readonly helper: HelperClient,
    private readonly failures: Partial<Record<keyof HelperClient, number>>,
  ) {}

  aggregate(request: DapRequest): Promise<DapResponse> {
    return this.call("aggregate", request);
  }

  aggregateShare(request: DapRequest): Promise<DapResponse> {
    return this.call("aggregateShare", request);
  }

  private call(
    method: keyof HelperClient,
    request: DapRequest,
  ): Promise<DapResponse> {
    const left = this.failures[method] ?? 0;
    if (left > 0) {
      this.failures[method] = left - 1;
      return Promise.reject(new Error("helper unavailable"));
    }
    return this.helper[method](request);
  }
}

function unreliable(
  failures: Partial<Record<keyof HelperClient, number>>,
): Promise<TestDeployment> {
  return testDeployment(
    {},
    (helper) =>
      new UnreliableHelperClient(new LocalHelperClient(helper), failures),
  );
}

describe("Leader", () => {
  let t: TestDeployment;
  let task: TaskConfig;

  beforeEach(async () => {
    t = await testDeployment();
    task = t.timeIntervalTask;
  });

  context("upload", () => {
    it("queues a report for aggregation", async () => {
      const report = await testReport(t, task.taskId);
      await t.leader.upload(uploadRequest(report));

      const [group] = await t.leader.getReports(task.taskId);
      assert.equal(group.partialBatchSelector.type, QueryType.TimeInterval);
      assert.deepEqual(
        group.reports.map((queued) => queued.metadata.reportId.toString()),
        [report.metadata.reportId.toString()],
      );
    });

    it("returns an empty group once the queue is drained", async () => {
      await t.leader.upload(uploadRequest(await testReport(t, task.taskId)));
      await t.leader.getReports(task.taskId);

      const groups = await t.leader.getReports(task.taskId);
      assert.equal(groups.length, 1);
      assert.deepEqual(groups[0].reports, []);
    });

    it("refuses a report for an unknown task", async () => {
      const report = await testReport(t, TaskId.random());
      await assert.rejects(t.leader.upload(uploadRequest(report)), {
        kind: "unrecognizedTask",
      });
    });

    it("refuses a report with one input share", async () => {
      const report = await testReport(t, task.taskId);
      const truncated = new Report(
        report.taskId,
        report.metadata,
        report.publicShare,
        report.encryptedInputShares.slice(0, 1),
      );
      await assert.rejects(t.leader.upload(uploadRequest(truncated)), {
        kind: "unrecognizedMessage",
      });
    });

    it("refuses an unsupported protocol version", async () => {
      const report = await testReport(t, task.taskId);
      await assert.rejects(t.leader.upload(uploadRequest(report, "dap-01")), {
        kind: "invalidProtocolVersion",
      });
    });

    it("refuses the wrong media type", async () => {
      const report = await testReport(t, task.taskId);
      await assert.rejects(
        t.leader.upload({
          ...uploadRequest(report),
          mediaType: MEDIA_TYPES.COLLECT_REQ,
        }),
        { kind: "invalidProtocolVersion" },
      );
    });

    it("refuses a malformed report", async () => {
      await assert.rejects(
        t.leader.upload({
          ...uploadRequest(await testReport(t, task.taskId)),
          payload: Buffer.from([1, 2, 3]),
        }),
        { kind: "unrecognizedMessage" },
      );
    });

    it("refuses a report for an expired task", async () => {
      const report = await testReport(t, t.expiredTask.taskId);
      await assert.rejects(t.leader.upload(uploadRequest(report)), {
        kind: "reportTooLate",
      });
    });

    it("assigns fixed-size reports to batches of at most maxBatchSize", async () => {
      const { taskId } = t.fixedSizeTask;
      assert.equal(await t.leader.currentBatchId(taskId), undefined);

      await t.leader.upload(uploadRequest(await testReport(t, taskId)));
      await t.leader.upload(uploadRequest(await testReport(t, taskId)));
      const first = await t.leader.currentBatchId(taskId);
      await t.leader.upload(uploadRequest(await testReport(t, taskId)));
      const second = await t.leader.currentBatchId(taskId);

      assert(first && second);
      assert(!first.equals(second));
      const groups = await t.leader.getReports(taskId);
      assert.deepEqual(
        groups.map(({ reports }) => reports.length),
        [2, 1],
      );
    });
  });

  context("aggregation", () => {
    it("commits reports both aggregators accept", async () => {
      for (const measurement of [true, false, true]) {
        await t.leader.upload(
          uploadRequest(await testReport(t, task.taskId, measurement)),
        );
      }

      assert.equal(await t.leader.runAggregationJobs(), 3);
      const buckets = task.bucketsFor(task.queryForCurrentBatchWindow(t.now));
      const leaderShare = await t.leader.aggregates.getAggShare(task, buckets);
      const helperShare = await t.helper.aggregates.getAggShare(task, buckets);
      assert.equal(leaderShare.reportCount, 3);
      assert.equal(helperShare.reportCount, 3);
      assert.deepEqual(leaderShare.checksum, helperShare.checksum);
    });

    it("has nothing to do when no reports are queued", async () => {
      assert.equal(await t.leader.runAggregationJobs(), 0);
    });

    it("aggregates a report uploaded twice only once", async () => {
      const report = await testReport(t, task.taskId);
      await t.leader.upload(uploadRequest(report));
      await t.leader.upload(uploadRequest(report));

      assert.equal(await t.leader.runAggregationJobs(), 1);
      await t.leader.upload(uploadRequest(report));
      assert.equal(await t.leader.runAggregationJobs(), 0);
    });

    it("puts reports back when the helper cannot be reached", async () => {
      t = await unreliable({ aggregate: 1 });
      task = t.timeIntervalTask;
      const report = await testReport(t, task.taskId);
      await t.leader.upload(uploadRequest(report));

      await assert.rejects(t.leader.runAggregationJobs(), /helper unavailable/);
      const { reportId } = report.metadata;
      assert.equal(
        await t.leader.reports.isProcessed(task.taskId, reportId),
        false,
      );
      assert.equal(await t.leader.runAggregationJobs(), 1);
    });

    it("puts back the task's later groups along with the failed one", async () => {
      t = await unreliable({ aggregate: 1 });
      const { taskId } = t.fixedSizeTask;
      for (let i = 0; i < 3; i++) {
        await t.leader.upload(uploadRequest(await testReport(t, taskId)));
      }

      await assert.rejects(t.leader.runAggregationJobs(), /helper unavailable/);
      assert.equal(await t.leader.runAggregationJobs(), 3);
    });

    it("skips a job whose reports all fail at the leader", async () => {
      const report = await testReport(t, task.taskId);
      await t.leader.upload(uploadRequest(report));
      await t.leader.runAggregationJobs();

      const init = await t.leader.produceAggInitReq(
        task,
        AggregationJobId.random(),
        new TimeIntervalPartialSelector(),
        [report],
      );
      assert.deepEqual(init, { state: "skip" });
    });

    it("refuses a response with the wrong number of transitions", async () => {
      const report = await testReport(t, task.taskId);
      const init = await t.leader.produceAggInitReq(
        task,
        AggregationJobId.random(),
        new TimeIntervalPartialSelector(),
        [report],
      );
      if (init.state !== "continue") throw new Error("expected a request");

      assert.throws(
        () =>
          t.leader.handleAggInitResp(init.leaderState, new AggregateResp([])),
        { kind: "unrecognizedMessage" },
      );
    });

    it("refuses a response that finishes a report early", async () => {
      const report = await testReport(t, task.taskId);
      const init = await t.leader.produceAggInitReq(
        task,
        AggregationJobId.random(),
        new TimeIntervalPartialSelector(),
        [report],
      );
      if (init.state !== "continue") throw new Error("expected a request");

      assert.throws(
        () =>
          t.leader.handleAggInitResp(
            init.leaderState,
            new AggregateResp([Transition.finished(report.metadata.reportId)]),
          ),
        { kind: "unrecognizedMessage" },
      );
    });
  });

  context("collect", () => {
    const truncatedNow = () => task.truncateTime(t.now);

    it("returns a locator under the leader's URL", async () => {
      const url = await t.leader.submitCollect(
        collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
      );

      const prefix = `${LEADER_URL}collect/task/${task.taskId.toString()}/req/`;
      assert(url.toString().startsWith(prefix));
      const collectId = new CollectionJobId(
        url.toString().slice(prefix.length),
      );
      assert.deepEqual(
        await t.leader.pollCollectJob(task.taskId, collectId),
        { status: "pending" },
      );
    });

    it("refuses a collector without the collector token", async () => {
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(
            task.taskId,
            task.queryForCurrentBatchWindow(t.now),
            "this is a bearer token!",
          ),
        ),
        { kind: "unauthorizedRequest" },
      );
    });

    it("refuses a fixed-size query for a time-interval task", async () => {
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(task.taskId, new FixedSizeQuery(BatchId.random())),
        ),
        { kind: "queryMismatch" },
      );
    });

    it("refuses an unknown fixed-size batch", async () => {
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(
            t.fixedSizeTask.taskId,
            new FixedSizeQuery(BatchId.random()),
          ),
        ),
        { kind: "batchInvalid" },
      );
    });

    it("refuses an interval not aligned to the time precision", async () => {
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(
            task.taskId,
            new TimeIntervalQuery(new Interval(truncatedNow() + 1, 3600)),
          ),
        ),
        { kind: "batchInvalid" },
      );
    });

    it("refuses a batch interval that is too large", async () => {
      const interval = new Interval(
        truncatedNow(),
        t.global.maxBatchDuration + task.timePrecision,
      );
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(task.taskId, new TimeIntervalQuery(interval)),
        ),
        { kind: "badRequest", detail: "batch interval too large" },
      );
    });

    it("refuses a batch interval too far into the past", async () => {
      const interval = new Interval(
        truncatedNow() - t.global.minBatchIntervalStart - task.timePrecision,
        task.timePrecision * 2,
      );
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(task.taskId, new TimeIntervalQuery(interval)),
        ),
        { kind: "badRequest", detail: "batch interval too far into past" },
      );
    });

    it("refuses a batch interval too far into the future", async () => {
      const interval = new Interval(
        truncatedNow() + t.global.maxBatchIntervalEnd - task.timePrecision,
        task.timePrecision * 2,
      );
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(task.taskId, new TimeIntervalQuery(interval)),
        ),
        { kind: "badRequest", detail: "batch interval too far into future" },
      );
    });

    it("accepts a batch interval of the maximum duration", async () => {
      const interval = new Interval(
        truncatedNow() - t.global.maxBatchDuration / 2,
        t.global.maxBatchDuration,
      );
      await t.leader.submitCollect(
        collectRequest(task.taskId, new TimeIntervalQuery(interval)),
      );
    });

    it("refuses a second collection of the same batch", async () => {
      const query = task.queryForCurrentBatchWindow(t.now);
      await t.leader.upload(uploadRequest(await testReport(t, task.taskId)));
      await t.leader.runAggregationJobs();
      await t.leader.submitCollect(collectRequest(task.taskId, query));
      assert.equal(await t.leader.runPendingCollectJobs(), 1);

      await assert.rejects(
        t.leader.submitCollect(collectRequest(task.taskId, query)),
        { kind: "batchOverlap" },
      );
    });

    it("refuses an interval that partly overlaps a collected batch", async () => {
      await t.leader.upload(uploadRequest(await testReport(t, task.taskId)));
      await t.leader.runAggregationJobs();
      await t.leader.submitCollect(
        collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
      );
      assert.equal(await t.leader.runPendingCollectJobs(), 1);

      const spanning = new Interval(truncatedNow(), task.timePrecision * 2);
      await assert.rejects(
        t.leader.submitCollect(
          collectRequest(task.taskId, new TimeIntervalQuery(spanning)),
        ),
        { kind: "batchOverlap" },
      );
    });

    it("refuses a request that carries no token", async () => {
      const req: DapRequest = {
        ...collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
        senderAuth: undefined,
      };
      await assert.rejects(t.leader.submitCollect(req), {
        kind: "unauthorizedRequest",
      });
    });

    it("checks the token before looking up the task", async () => {
      const taskId = TaskId.random();
      const query = task.queryForCurrentBatchWindow(t.now);
      await assert.rejects(
        t.leader.submitCollect(collectRequest(taskId, query, "not the token")),
        { kind: "unauthorizedRequest" },
      );
      await assert.rejects(
        t.leader.submitCollect({
          ...collectRequest(taskId, query),
          senderAuth: undefined,
        }),
        { kind: "unauthorizedRequest" },
      );
      await assert.rejects(
        t.leader.submitCollect(collectRequest(taskId, query)),
        { kind: "unrecognizedTask" },
      );
    });

    it("sends the same share again after the helper fails", async () => {
      t = await unreliable({ aggregateShare: 1 });
      task = t.timeIntervalTask;
      await t.leader.upload(uploadRequest(await testReport(t, task.taskId)));
      await t.leader.runAggregationJobs();
      await t.leader.submitCollect(
        collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
      );

      const [job] = await t.leader.getPendingCollectJobs();
      await assert.rejects(t.leader.runCollectJob(job), /helper unavailable/);
      const [retry] = await t.leader.getPendingCollectJobs();
      assert.equal(retry.share?.reportCount, 1);

      const resp = await t.leader.runCollectJob(retry);
      assert.equal(resp.reportCount, 1);
      assert.deepEqual(await t.leader.getPendingCollectJobs(), []);
    });

    it("leaves a job pending until the batch is large enough", async () => {
      await t.leader.submitCollect(
        collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
      );

      assert.equal(await t.leader.runPendingCollectJobs(), 0);
      assert.equal((await t.leader.getPendingCollectJobs()).length, 1);
    });

    it("reports unknown, pending and done jobs", async () => {
      const collectId = CollectionJobId.random();
      assert.deepEqual(await t.leader.pollCollectJob(task.taskId, collectId), {
        status: "unknown",
      });

      await t.leader.upload(uploadRequest(await testReport(t, task.taskId)));
      await t.leader.runAggregationJobs();
      await t.leader.submitCollect(
        collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
      );
      const [job] = await t.leader.getPendingCollectJobs();
      assert.deepEqual(
        await t.leader.pollCollectJob(task.taskId, job.collectId),
        { status: "pending" },
      );

      const resp = await t.leader.runCollectJob(job);
      const poll = () =>
        t.leader.collectJobStatus(
          {
            version: DAP_VERSION,
            taskId: task.taskId,
            payload: Buffer.alloc(0),
            url: new URL(LEADER_URL),
            senderAuth: COLLECTOR_TOKEN,
          },
          job.collectId,
        );
      assert.deepEqual(await poll(), { status: "done", response: resp });
      assert.deepEqual(await poll(), { status: "done", response: resp });
    });

    it("forgets finished jobs after the retention window", async () => {
      t = await testDeployment({ collectJobRetention: 60 });
      task = t.timeIntervalTask;
      await t.leader.upload(uploadRequest(await testReport(t, task.taskId)));
      await t.leader.runAggregationJobs();
      await t.leader.submitCollect(
        collectRequest(task.taskId, task.queryForCurrentBatchWindow(t.now)),
      );
      const [job] = await t.leader.getPendingCollectJobs();
      await t.leader.runCollectJob(job);

      assert.equal(await t.leader.evictCollectJobs(t.now + 60), 0);
      assert.equal(await t.leader.evictCollectJobs(t.now + 61), 1);
      assert.deepEqual(
        await t.leader.pollCollectJob(task.taskId, job.collectId),
        { status: "unknown" },
      );
    });
  });

  context("hpke_config", () => {
    const request = (query: string) => ({
      version: DAP_VERSION,
      payload: Buffer.alloc(0),
      url: new URL(`hpke_config${query}`, LEADER_URL),
    });

    it("serves its config for a known task", async () => {
      const resp = await t.leader.hpkeConfig(
        request(`?task_id=${task.taskId.toString()}`),
      );
      assert.equal(resp.mediaType, MEDIA_TYPES.HPKE_CONFIG);
      assert.deepEqual(resp.payload, t.leader.hpkeConfigFor().encode());
    });

    it("refuses an unknown task", async () => {
      await assert.rejects(
        t.leader.hpkeConfig(request(`?task_id=${TaskId.random().toString()}`)),
        { kind: "unrecognizedTask" },
      );
    });

    it("requires a task ID", async () => {
      await assert.rejects(t.leader.hpkeConfig(request("")), {
        kind: "missingTaskId",
      });
    });

    it("serves its config without a task ID when allowed", async () => {
      t = await testDeployment({ requireHpkeConfigTaskId: false });
      const resp = await t.leader.hpkeConfig(request(""));
      assert.deepEqual(resp.payload, t.leader.hpkeConfigFor().encode());
    });
  });

  context("replay retention", () => {
    it("clears replay sets of tasks expired past the window", async () => {
      t = await testDeployment({ replayRetention: 10 });
      const { taskId } = t.expiredTask;
      const report = await testReport(t, taskId);
      await t.leader.reports.tryMarkProcessed(taskId, report.metadata.reportId);

      assert.equal(await t.leader.evictReplaySets(t.now + 9), 0);
      assert.equal(await t.leader.evictReplaySets(t.now + 10), 1);
      assert.equal(
        await t.leader.reports.isProcessed(taskId, report.metadata.reportId),
        false,
      );
    });

    it("keeps replay sets when no window is configured", async () => {
      assert.equal(await t.leader.evictReplaySets(t.now + 1_000_000), 0);
    });
  });
});
