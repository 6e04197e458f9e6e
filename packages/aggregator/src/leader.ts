import { Buffer } from "buffer";
import {
  AggregateContinueReq,
  AggregateInitializeReq,
  AggregateResp,
  AggregateShareReq,
  AggregateShareResp,
  AggregationJobId,
  CollectReq,
  CollectResp,
  CollectionJobId,
  DapAbort,
  FixedSizePartialSelector,
  MEDIA_TYPES,
  PartialBatchSelector,
  QueryType,
  Report,
  ReportShare,
  Role,
  TimeIntervalPartialSelector,
  Transition,
  TransitionFailure,
  TransitionType,
  type BatchId,
  type BatchSelector,
  type ReportId,
  type TaskId,
} from "@tally/dap";
import { VdafError } from "@tally/vdaf";
import {
  DapAggregator,
  type AggregatorOptions,
  type OutputShareEntry,
} from "./aggregator.js";
import { MemoryCollectJobStore } from "./memory.js";
import type { DapRequest, DapResponse, HelperClient } from "./request.js";
import type {
  CollectJob,
  CollectJobStore,
  PendingCollectJob,
  ReportGroup,
} from "./storage.js";
import type { TaskConfig } from "./task.js";

export interface LeaderOptions extends AggregatorOptions {
  helper: HelperClient;
  collectJobs?: CollectJobStore;
}

interface LeaderReportState {
  reportId: ReportId;
  time: number;
  preparationState: Buffer;
  preparationShare: Buffer;
}

/** A job whose initialize request is waiting on the Helper. */
export interface LeaderState {
  task: TaskConfig;
  jobId: AggregationJobId;
  partialBatchSelector: PartialBatchSelector;
  reports: LeaderReportState[];
}

/**
   A job whose output shares are computed but not yet merged, waiting
   on the Helper's response to the continue request.
*/
export interface LeaderUncommitted {
  task: TaskConfig;
  jobId: AggregationJobId;
  partialBatchSelector: PartialBatchSelector;
  outputs: OutputShareEntry[];
}

export type AggInitStep =
  | {
      state: "continue";
      leaderState: LeaderState;
      request: AggregateInitializeReq;
    }
  | { state: "skip" };

export type AggContinueStep =
  | {
      state: "uncommitted";
      uncommitted: LeaderUncommitted;
      request: AggregateContinueReq;
    }
  | { state: "skip" };

export class Leader extends DapAggregator {
  protected readonly role = Role.Leader;
  readonly collectJobs: CollectJobStore;
  private readonly helper: HelperClient;

  constructor(options: LeaderOptions) {
    super(options, "tally:leader");
    this.helper = options.helper;
    this.collectJobs = options.collectJobs ?? new MemoryCollectJobStore();
  }

  /**
     `PUT upload`: queues a Client's report for the next aggregation
     job. Replays are caught at aggregation time, not here.
  */
  async upload(req: DapRequest): Promise<void> {
    this.checkVersion(req);
    this.checkMediaType(req, MEDIA_TYPES.REPORT);
    const report = this.decode(Report, req.payload, req.taskId);
    const { taskId, metadata } = report;

    const task = await this.resolveTask(taskId, req.version, metadata);
    this.checkTaskVersion(req, task);

    if (report.encryptedInputShares.length !== 2) {
      throw new DapAbort(
        "unrecognizedMessage",
        `expected 2 input shares, got ${report.encryptedInputShares.length}`,
        taskId,
      );
    }
    if (task.isExpired(this.now()) || metadata.time >= task.expiration) {
      throw new DapAbort("reportTooLate", undefined, taskId);
    }

    const partialBatchSelector =
      task.query.type === "fixedSize"
        ? new FixedSizePartialSelector(
            await this.reports.assignBatch(taskId, task.query.maxBatchSize),
          )
        : new TimeIntervalPartialSelector();
    await this.reports.enqueue(taskId, partialBatchSelector, report);
  }

  /** The batch new reports of a fixed-size task are assigned to. */
  async currentBatchId(taskId: TaskId): Promise<BatchId | undefined> {
    return this.reports.currentBatch(taskId);
  }

  /**
     Drains the reports queued for a task, one group per partial batch
     selector. A drained task yields a single empty group.
  */
  async getReports(taskId: TaskId): Promise<ReportGroup[]> {
    const task = await this.getTask(taskId);
    const groups = await this.reports.drain(taskId);
    if (groups.length > 0) return groups;

    const batchId = await this.currentBatchId(taskId);
    const partialBatchSelector =
      task.queryType === QueryType.FixedSize && batchId
        ? new FixedSizePartialSelector(batchId)
        : new TimeIntervalPartialSelector();
    return [{ partialBatchSelector, reports: [] }];
  }

  /**
     Prepares the Leader's shares of a job's reports and builds the
     initialize request carrying the Helper's shares of the survivors.
  */
  async produceAggInitReq(
    task: TaskConfig,
    jobId: AggregationJobId,
    partialBatchSelector: PartialBatchSelector,
    reports: Report[],
  ): Promise<AggInitStep> {
    const aggregationParameter = Buffer.alloc(0);
    const states: LeaderReportState[] = [];
    const helperShares: ReportShare[] = [];

    for (const report of reports) {
      const result = await this.prepareInit(
        task,
        report.shareFor(Role.Leader),
        aggregationParameter,
        partialBatchSelector,
      );
      if (!result.ok) continue;
      states.push(result);
      helperShares.push(report.shareFor(Role.Helper));
    }

    if (states.length === 0) return { state: "skip" };
    return {
      state: "continue",
      leaderState: { task, jobId, partialBatchSelector, reports: states },
      request: new AggregateInitializeReq(
        task.taskId,
        jobId,
        aggregationParameter,
        partialBatchSelector,
        helperShares,
      ),
    };
  }

  /**
     Combines preparation shares for every report the Helper continued
     and computes the Leader's output shares.
  */
  handleAggInitResp(
    leaderState: LeaderState,
    resp: AggregateResp,
  ): AggContinueStep {
    const { task, jobId } = leaderState;
    checkTransitions(
      task.taskId,
      leaderState.reports.map(({ reportId }) => reportId),
      resp.transitions,
    );

    const outputs: OutputShareEntry[] = [];
    const transitions: Transition[] = [];
    for (const [i, report] of leaderState.reports.entries()) {
      const { reportId, time } = report;
      const { variant } = resp.transitions[i];
      switch (variant.type) {
        case TransitionType.Failed:
          this.logger.debug(
            `helper rejected report ${reportId.toString()}: ` +
              TransitionFailure[variant.failure],
          );
          continue;
        case TransitionType.Finished:
          throw new DapAbort(
            "unrecognizedMessage",
            `helper finished report ${reportId.toString()} early`,
            task.taskId,
          );
      }

      try {
        const message = task.vdaf.unshardPreparationShares(Buffer.alloc(0), [
          report.preparationShare,
          variant.payload,
        ]);
        const outputShare = task.vdaf.prepareNext(
          report.preparationState,
          message,
        );
        outputs.push({ reportId, time, outputShare });
        transitions.push(Transition.continued(reportId, message));
      } catch (error) {
        if (!(error instanceof VdafError)) throw error;
        this.logger.debug(
          `report ${reportId.toString()} rejected: ${error.message}`,
        );
      }
    }

    if (outputs.length === 0) return { state: "skip" };
    return {
      state: "uncommitted",
      uncommitted: {
        task,
        jobId,
        partialBatchSelector: leaderState.partialBatchSelector,
        outputs,
      },
      request: new AggregateContinueReq(task.taskId, jobId, transitions),
    };
  }

  /**
     Keeps the output shares of reports the Helper finished. Reports
     whose bucket was collected meanwhile are dropped.
  */
  async handleFinalAggResp(
    uncommitted: LeaderUncommitted,
    resp: AggregateResp,
  ): Promise<OutputShareEntry[]> {
    const { task, outputs, partialBatchSelector } = uncommitted;
    checkTransitions(
      task.taskId,
      outputs.map(({ reportId }) => reportId),
      resp.transitions,
    );

    const finished: OutputShareEntry[] = [];
    for (const [i, output] of outputs.entries()) {
      const { variant } = resp.transitions[i];
      if (variant.type === TransitionType.Continued) {
        throw new DapAbort(
          "unrecognizedMessage",
          `helper continued report ${output.reportId.toString()} twice`,
          task.taskId,
        );
      }
      if (variant.type === TransitionType.Failed) {
        this.logger.debug(
          `helper rejected report ${output.reportId.toString()}: ` +
            TransitionFailure[variant.failure],
        );
        continue;
      }

      const bucket = task.bucketFor(output.time, partialBatchSelector);
      if (await this.aggregates.isCollected(task.taskId, bucket)) {
        this.logger.debug(
          `report ${output.reportId.toString()} rejected: batch collected`,
        );
        continue;
      }
      finished.push(output);
    }
    return finished;
  }

  /**
     Drives one aggregation job to completion against the Helper and
     commits the result. Resolves to the number of reports committed.
     Reports go back in the queue when the job fails before commit.
  */
  async runAggregationJob(
    task: TaskConfig,
    group: ReportGroup,
  ): Promise<number> {
    const { partialBatchSelector, reports } = group;
    const jobId = AggregationJobId.random();

    let outputs: OutputShareEntry[];
    try {
      outputs = await this.aggregateWithHelper(task, jobId, group);
    } catch (error) {
      await this.requeue(task.taskId, [group]);
      throw error;
    }

    const fresh: OutputShareEntry[] = [];
    for (const output of outputs) {
      if (await this.reports.tryMarkProcessed(task.taskId, output.reportId)) {
        fresh.push(output);
      } else {
        this.logger.debug(
          `report ${output.reportId.toString()} rejected: replayed`,
        );
      }
    }
    const committed = await this.commit(task, partialBatchSelector, fresh);

    this.logger.info(
      `aggregation job ${jobId.toString()} committed ${committed.length} of ` +
        `${reports.length} reports for task ${task.taskId.toString()}`,
    );
    return committed.length;
  }

  private async aggregateWithHelper(
    task: TaskConfig,
    jobId: AggregationJobId,
    { partialBatchSelector, reports }: ReportGroup,
  ): Promise<OutputShareEntry[]> {
    const init = await this.produceAggInitReq(
      task,
      jobId,
      partialBatchSelector,
      reports,
    );
    if (init.state === "skip") return [];

    const initResp = await this.sendAggregate(
      task,
      MEDIA_TYPES.AGGREGATE_INITIALIZE_REQ,
      init.request.encode(),
    );
    const cont = this.handleAggInitResp(init.leaderState, initResp);
    if (cont.state === "skip") return [];

    const finalResp = await this.sendAggregate(
      task,
      MEDIA_TYPES.AGGREGATE_CONTINUE_REQ,
      cont.request.encode(),
    );
    return this.handleFinalAggResp(cont.uncommitted, finalResp);
  }

  /**
     Aggregates every queued report of every task. When a job fails,
     the reports it and the task's later jobs held are queued again
     before the error propagates.
  */
  async runAggregationJobs(): Promise<number> {
    let committed = 0;
    for (const taskId of await this.reports.pendingTasks()) {
      const task = await this.getTask(taskId);
      const groups = await this.getReports(taskId);
      for (const [i, group] of groups.entries()) {
        try {
          committed += await this.runAggregationJob(task, group);
        } catch (error) {
          await this.requeue(taskId, groups.slice(i + 1));
          throw error;
        }
      }
    }
    return committed;
  }

  private async requeue(taskId: TaskId, groups: ReportGroup[]): Promise<void> {
    for (const { partialBatchSelector, reports } of groups) {
      for (const report of reports) {
        await this.reports.enqueue(taskId, partialBatchSelector, report);
      }
    }
  }

  private async sendAggregate(
    task: TaskConfig,
    mediaType: string,
    payload: Buffer,
  ): Promise<AggregateResp> {
    const resp = await this.helper.aggregate(
      this.helperRequest(task, "aggregate", mediaType, payload),
    );
    this.expectMediaType(task, resp, MEDIA_TYPES.AGGREGATE_RESP);
    return this.decode(AggregateResp, resp.payload, task.taskId);
  }

  private helperRequest(
    task: TaskConfig,
    path: string,
    mediaType: string,
    payload: Buffer,
  ): DapRequest {
    return {
      version: task.version,
      mediaType,
      taskId: task.taskId,
      payload,
      url: new URL(path, task.helperUrl),
      senderAuth: this.tokens.leaderToken(task.taskId),
    };
  }

  private expectMediaType(
    task: TaskConfig,
    resp: DapResponse,
    expected: string,
  ): void {
    if (resp.mediaType !== expected) {
      throw new DapAbort(
        "unrecognizedMessage",
        `helper responded with ${resp.mediaType}, expected ${expected}`,
        task.taskId,
      );
    }
  }

  /**
     `POST collect`: validates a Collector's query and opens a collect
     job for it. Resolves to the URL the Collector polls.
  */
  async submitCollect(req: DapRequest): Promise<URL> {
    this.authorize(this.tokens.collectorToken(req.taskId), req);
    this.checkVersion(req);
    this.checkMediaType(req, MEDIA_TYPES.COLLECT_REQ);
    const collectReq = this.decode(CollectReq, req.payload, req.taskId);
    const { taskId, query } = collectReq;

    const task = await this.getTask(taskId);
    this.checkTaskVersion(req, task);

    await task.validateQuery(query, (batchId) =>
      this.aggregates.batchExists(taskId, batchId),
    );
    if (query.type === QueryType.TimeInterval) {
      task.validateBatchInterval(query.batchInterval, this.now(), this.global);
    }
    if (await this.aggregates.isOverlapping(taskId, task.bucketsFor(query))) {
      throw new DapAbort("batchOverlap", undefined, taskId);
    }

    const collectId = CollectionJobId.random();
    await this.collectJobs.create(taskId, collectId, collectReq);
    return new URL(
      `collect/task/${taskId.toString()}/req/${collectId.toString()}`,
      task.leaderUrl,
    );
  }

  async getPendingCollectJobs(): Promise<PendingCollectJob[]> {
    return this.collectJobs.pending();
  }

  /**
     Completes a collect job: collects the Leader's aggregate share,
     fetches the Helper's and records the result. The job stays pending
     when the batch is not yet large enough. Once collected, the
     Leader's share is kept with the job so a retry after a failed
     Helper exchange sends the same one.
  */
  async runCollectJob(job: PendingCollectJob): Promise<CollectResp> {
    const { taskId, collectId, request } = job;
    const task = await this.getTask(taskId);
    const selector: BatchSelector = request.query;

    let share = job.share;
    if (!share) {
      share = await this.aggregates.collect(
        task,
        task.bucketsFor(selector),
        ({ reportCount }) => {
          if (!task.isReportCountCompatible(reportCount)) {
            throw new DapAbort(
              "invalidBatchSize",
              `batch has ${reportCount} reports`,
              taskId,
            );
          }
        },
      );
      await this.collectJobs.recordShare(taskId, collectId, share);
    }
    const leaderShare = await this.sealAggregateShare(task, selector, share);

    const shareReq = new AggregateShareReq(
      taskId,
      selector,
      request.aggregationParameter,
      share.reportCount,
      share.checksum,
    );
    const resp = await this.helper.aggregateShare(
      this.helperRequest(
        task,
        "aggregate_share",
        MEDIA_TYPES.AGGREGATE_SHARE_REQ,
        shareReq.encode(),
      ),
    );
    this.expectMediaType(task, resp, MEDIA_TYPES.AGGREGATE_SHARE_RESP);
    const helperShare = this.decode(AggregateShareResp, resp.payload, taskId);

    const collectResp = new CollectResp(
      PartialBatchSelector.from(selector),
      share.reportCount,
      [leaderShare, helperShare.encryptedAggregateShare],
    );
    await this.finishCollectJob(taskId, collectId, collectResp);
    this.logger.info(
      `collect job ${collectId.toString()} done with ${share.reportCount} ` +
        `reports for task ${taskId.toString()}`,
    );
    return collectResp;
  }

  /**
     Runs every pending collect job once. Jobs that abort stay pending
     and are retried on the next run.
  */
  async runPendingCollectJobs(): Promise<number> {
    let finished = 0;
    for (const job of await this.getPendingCollectJobs()) {
      try {
        await this.runCollectJob(job);
        finished++;
      } catch (error) {
        if (!(error instanceof DapAbort)) throw error;
        this.logger.warn(
          `collect job ${job.collectId.toString()} not finished: ${error.message}`,
        );
      }
    }
    return finished;
  }

  async finishCollectJob(
    taskId: TaskId,
    collectId: CollectionJobId,
    resp: CollectResp,
  ): Promise<void> {
    await this.collectJobs.finish(taskId, collectId, resp, this.now());
  }

  async pollCollectJob(
    taskId: TaskId,
    collectId: CollectionJobId,
  ): Promise<CollectJob> {
    return this.collectJobs.get(taskId, collectId);
  }

  /** `GET` on a collect job locator, on behalf of the Collector. */
  async collectJobStatus(
    req: DapRequest,
    collectId: CollectionJobId,
  ): Promise<CollectJob> {
    this.authorize(this.tokens.collectorToken(req.taskId), req);
    this.checkVersion(req);
    if (!req.taskId) throw new DapAbort("unrecognizedTask");
    this.checkTaskVersion(req, await this.getTask(req.taskId));
    return this.pollCollectJob(req.taskId, collectId);
  }

  /**
     Drops collect jobs that finished more than `collectJobRetention`
     seconds before `now`.
  */
  async evictCollectJobs(now: number = this.now()): Promise<number> {
    const retention = this.global.collectJobRetention;
    if (retention === null) return 0;
    return this.collectJobs.evictFinishedBefore(now - retention);
  }
}

/** A Helper response must answer every report of the request, in order. */
function checkTransitions(
  taskId: TaskId,
  expected: ReportId[],
  transitions: Transition[],
): void {
  if (transitions.length !== expected.length) {
    throw new DapAbort(
      "unrecognizedMessage",
      `expected ${expected.length} transitions, got ${transitions.length}`,
      taskId,
    );
  }
  transitions.forEach(({ reportId }, i) => {
    if (!reportId.equals(expected[i])) {
      throw new DapAbort(
        "unrecognizedMessage",
        `transition ${i} is for report ${reportId.toString()}`,
        taskId,
      );
    }
  });
}
