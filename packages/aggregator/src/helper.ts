import type { Buffer } from "buffer";
import {
  AggregateContinueReq,
  AggregateInitializeReq,
  AggregateResp,
  AggregateShareReq,
  AggregateShareResp,
  DapAbort,
  MEDIA_TYPES,
  QueryType,
  Role,
  Transition,
  TransitionFailure,
  TransitionType,
  type TaskId,
} from "@tally/dap";
import { VdafError } from "@tally/vdaf";
import { DapAggregator, type AggregatorOptions } from "./aggregator.js";
import type { OutputShareEntry } from "./aggregator.js";
import { HelperReportState, HelperState } from "./helperState.js";
import { MemoryHelperStateStore } from "./memory.js";
import type { DapRequest, DapResponse } from "./request.js";
import type { HelperStateStore } from "./storage.js";
import type { TaskConfig } from "./task.js";

export interface HelperOptions extends AggregatorOptions {
  helperStates?: HelperStateStore;
}

const JOB_EXISTS = "unexpected message for aggregation job (already exists)";

export class Helper extends DapAggregator {
  protected readonly role = Role.Helper;
  readonly helperStates: HelperStateStore;

  constructor(options: HelperOptions) {
    super(options, "tally:helper");
    this.helperStates = options.helperStates ?? new MemoryHelperStateStore();
  }

  /**
     `POST aggregate`: an initialize or continue message, told apart by
     media type.
  */
  async handleAggregate(req: DapRequest): Promise<DapResponse> {
    this.authorize(this.tokens.leaderToken(req.taskId), req);
    this.checkVersion(req);

    switch (req.mediaType) {
      case MEDIA_TYPES.AGGREGATE_INITIALIZE_REQ:
        return this.aggregateInit(req);
      case MEDIA_TYPES.AGGREGATE_CONTINUE_REQ:
        return this.aggregateContinue(req);
      default:
        throw new DapAbort(
          "invalidProtocolVersion",
          `unexpected media type ${req.mediaType ?? "(none)"}`,
          req.taskId,
        );
    }
  }

  private async aggregateInit(req: DapRequest): Promise<DapResponse> {
    const initReq = this.decode(
      AggregateInitializeReq,
      req.payload,
      req.taskId,
    );
    const { taskId, aggregationJobId: jobId } = initReq;
    const task = await this.resolveTask(
      taskId,
      req.version,
      initReq.reportShares.find(({ metadata }) => metadata.taskprovPayload())
        ?.metadata,
    );
    this.checkTaskVersion(req, task);

    if (initReq.partialBatchSelector.type !== task.queryType) {
      throw new DapAbort("queryMismatch", undefined, taskId);
    }
    if (!(await this.helperStates.claim(taskId, jobId))) {
      throw DapAbort.badRequest(JOB_EXISTS, taskId);
    }

    let transitions: Transition[];
    try {
      transitions = await this.initializeReports(task, initReq);
    } catch (error) {
      await this.helperStates.release(taskId, jobId);
      throw error;
    }

    return {
      mediaType: MEDIA_TYPES.AGGREGATE_RESP,
      payload: new AggregateResp(transitions).encode(),
    };
  }

  /** Prepares every report share of a claimed job and stores its state. */
  private async initializeReports(
    task: TaskConfig,
    initReq: AggregateInitializeReq,
  ): Promise<Transition[]> {
    const transitions: Transition[] = [];
    const states: HelperReportState[] = [];
    for (const reportShare of initReq.reportShares) {
      const result = await this.prepareInit(
        task,
        reportShare,
        initReq.aggregationParameter,
        initReq.partialBatchSelector,
      );
      if (result.ok) {
        states.push(
          new HelperReportState(
            result.reportId,
            result.time,
            result.preparationState,
          ),
        );
        transitions.push(
          Transition.continued(result.reportId, result.preparationShare),
        );
      } else {
        transitions.push(Transition.failed(result.reportId, result.failure));
      }
    }

    const state = new HelperState(
      initReq.partialBatchSelector,
      initReq.aggregationParameter,
      states,
    );
    await this.helperStates.put(
      task.taskId,
      initReq.aggregationJobId,
      state.encode(),
    );
    return transitions;
  }

  private async aggregateContinue(req: DapRequest): Promise<DapResponse> {
    const contReq = this.decode(
      AggregateContinueReq,
      req.payload,
      req.taskId,
    );
    const { taskId, aggregationJobId: jobId } = contReq;
    const task = await this.getTask(taskId);
    this.checkTaskVersion(req, task);

    const encoded = await this.helperStates.take(taskId, jobId);
    if (!encoded) {
      throw new DapAbort("unrecognizedAggregationJob", undefined, taskId);
    }
    const state = HelperState.parse(encoded);

    let matched: { report: HelperReportState; message: Buffer }[];
    try {
      matched = matchTransitions(taskId, state.reports, contReq.transitions);
    } catch (error) {
      await this.helperStates.put(taskId, jobId, encoded);
      throw error;
    }

    let transitions: Transition[] = [];
    const outputs: OutputShareEntry[] = [];
    for (const { report, message } of matched) {
      const { reportId, time } = report;
      const bucket = task.bucketFor(time, state.partialBatchSelector);
      if (await this.aggregates.isCollected(taskId, bucket)) {
        transitions.push(
          Transition.failed(reportId, TransitionFailure.BatchCollected),
        );
        continue;
      }

      try {
        const outputShare = task.vdaf.prepareNext(
          report.preparationState,
          message,
        );
        outputs.push({ reportId, time, outputShare });
        transitions.push(Transition.finished(reportId));
      } catch (error) {
        if (!(error instanceof VdafError)) throw error;
        this.logger.debug(
          `report ${reportId.toString()} rejected: ${error.message}`,
        );
        transitions.push(
          Transition.failed(reportId, TransitionFailure.VdafPrepError),
        );
      }
    }

    const committed = await this.commit(
      task,
      state.partialBatchSelector,
      outputs,
    );
    if (committed.length < outputs.length) {
      const landed = new Set(
        committed.map(({ reportId }) => reportId.toString()),
      );
      transitions = transitions.map((transition) =>
        transition.variant.type === TransitionType.Finished &&
        !landed.has(transition.reportId.toString())
          ? Transition.failed(
              transition.reportId,
              TransitionFailure.BatchCollected,
            )
          : transition,
      );
    }
    this.logger.info(
      `aggregation job ${jobId.toString()} committed ${committed.length} of ` +
        `${state.reports.length} reports`,
    );

    return {
      mediaType: MEDIA_TYPES.AGGREGATE_RESP,
      payload: new AggregateResp(transitions).encode(),
    };
  }

  /**
     `POST aggregate_share`: the Helper's encrypted share of a batch
     the Leader is collecting. The batch is marked collected.
  */
  async handleAggregateShare(req: DapRequest): Promise<DapResponse> {
    this.authorize(this.tokens.leaderToken(req.taskId), req);
    this.checkVersion(req);
    this.checkMediaType(req, MEDIA_TYPES.AGGREGATE_SHARE_REQ);

    const shareReq = this.decode(AggregateShareReq, req.payload, req.taskId);
    const { taskId, batchSelector } = shareReq;
    const task = await this.getTask(taskId);
    this.checkTaskVersion(req, task);

    await task.validateQuery(batchSelector, (batchId) =>
      this.aggregates.batchExists(taskId, batchId),
    );
    if (batchSelector.type === QueryType.TimeInterval) {
      task.checkBatchDuration(batchSelector.batchInterval, this.global);
    }

    const buckets = task.bucketsFor(batchSelector);
    const share = await this.aggregates.collect(task, buckets, (collected) => {
      if (
        collected.reportCount !== shareReq.reportCount ||
        !collected.checksum.equals(shareReq.checksum)
      ) {
        throw new DapAbort(
          "batchMismatch",
          `helper has ${collected.reportCount} reports, ` +
            `leader has ${shareReq.reportCount}`,
          taskId,
        );
      }
      if (!task.isReportCountCompatible(collected.reportCount)) {
        throw new DapAbort(
          "invalidBatchSize",
          `batch has ${collected.reportCount} reports`,
          taskId,
        );
      }
    });

    const encrypted = await this.sealAggregateShare(task, batchSelector, share);
    this.logger.info(
      `aggregate share of ${share.reportCount} reports sent for task ${taskId.toString()}`,
    );

    return {
      mediaType: MEDIA_TYPES.AGGREGATE_SHARE_RESP,
      payload: new AggregateShareResp(encrypted).encode(),
    };
  }
}

/**
   Pairs each continue transition with the report state it refers to.
   Transitions must name stored reports in stored order; reports the
   Leader dropped may be skipped.
*/
function matchTransitions(
  taskId: TaskId,
  reports: HelperReportState[],
  transitions: Transition[],
): { report: HelperReportState; message: Buffer }[] {
  const matched: { report: HelperReportState; message: Buffer }[] = [];
  let next = 0;
  for (const { reportId, variant } of transitions) {
    while (next < reports.length && !reports[next].reportId.equals(reportId)) {
      next++;
    }
    if (next === reports.length) {
      throw new DapAbort(
        "unrecognizedMessage",
        `unexpected transition for report ${reportId.toString()}`,
        taskId,
      );
    }
    if (variant.type !== TransitionType.Continued) {
      throw new DapAbort(
        "unrecognizedMessage",
        `expected a continued transition for report ${reportId.toString()}`,
        taskId,
      );
    }
    matched.push({ report: reports[next], message: variant.payload });
    next++;
  }
  return matched;
}
