import { Buffer } from "buffer";
import {
  AggregateShareAad,
  AggregateShareInfo,
  DapAbort,
  HpkeError,
  InputShareAad,
  InputShareInfo,
  MEDIA_TYPES,
  Parser,
  Role,
  SUPPORTED_VERSIONS,
  TaskId,
  TransitionFailure,
  openWithAny,
  type BatchSelector,
  type HpkeCiphertext,
  type HpkeConfig,
  type HpkeReceiverConfig,
  type ParseSource,
  type PartialBatchSelector,
  type ReportId,
  type ReportMetadata,
  type ReportShare,
} from "@tally/dap";
import { VdafError } from "@tally/vdaf";
import { AggregateShare } from "./aggregateShare.js";
import { tokenMatches, type BearerToken, type TokenStore } from "./auth.js";
import type { GlobalConfig, TaskprovSettings } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import {
  MemoryAggregateStore,
  MemoryReportStore,
  MemoryTaskStore,
} from "./memory.js";
import type { DapRequest, DapResponse } from "./request.js";
import type { AggregateStore, ReportStore, TaskStore } from "./storage.js";
import { bucketKey, type BatchBucket, type TaskConfig } from "./task.js";
import { taskFromTaskprov } from "./taskprov.js";

export interface AggregatorOptions {
  global: GlobalConfig;
  tokens: TokenStore;
  hpkeReceivers: HpkeReceiverConfig[];
  tasks?: TaskStore;
  reports?: ReportStore;
  aggregates?: AggregateStore;
  taskprov?: TaskprovSettings;
  logger?: Logger;
  /** current time in seconds since the epoch */
  clock?: () => number;
}

export type PrepareInitResult =
  | {
      ok: true;
      reportId: ReportId;
      time: number;
      preparationState: Buffer;
      preparationShare: Buffer;
    }
  | { ok: false; reportId: ReportId; failure: TransitionFailure };

export interface OutputShareEntry {
  reportId: ReportId;
  time: number;
  outputShare: bigint[];
}

interface Parseable<T> {
  parse(source: ParseSource): T;
}

/**
   What Leader and Helper share: task resolution, request checks, HPKE
   configuration, per-report preparation and committing output shares.
*/
export abstract class DapAggregator {
  readonly global: GlobalConfig;
  readonly tasks: TaskStore;
  readonly reports: ReportStore;
  readonly aggregates: AggregateStore;
  protected readonly tokens: TokenStore;
  protected readonly hpkeReceivers: HpkeReceiverConfig[];
  protected readonly taskprov?: TaskprovSettings;
  protected readonly logger: Logger;
  private readonly clock: () => number;

  protected abstract readonly role: Role.Leader | Role.Helper;

  constructor(options: AggregatorOptions, loggerPrefix: string) {
    this.global = options.global;
    this.tokens = options.tokens;
    this.hpkeReceivers = options.hpkeReceivers;
    this.tasks = options.tasks ?? new MemoryTaskStore();
    this.reports = options.reports ?? new MemoryReportStore();
    this.aggregates = options.aggregates ?? new MemoryAggregateStore();
    this.taskprov = options.taskprov;
    this.logger = options.logger ?? createLogger(loggerPrefix);
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  }

  now(): number {
    return this.clock();
  }

  async getTask(taskId: TaskId): Promise<TaskConfig> {
    const task = await this.tasks.get(taskId);
    if (!task) throw new DapAbort("unrecognizedTask", undefined, taskId);
    return task;
  }

  /**
     Looks up a task, provisioning it from a taskprov extension on
     `metadata` when it is unknown and taskprov is allowed. A task that
     is already registered always wins.
  */
  protected async resolveTask(
    taskId: TaskId,
    version: string,
    metadata?: ReportMetadata,
  ): Promise<TaskConfig> {
    const known = await this.tasks.get(taskId);
    if (known) return known;

    if (metadata && this.global.allowTaskprov && this.taskprov) {
      const provisioned = await taskFromTaskprov(
        taskId,
        metadata,
        this.taskprov,
        version,
      );
      if (provisioned && (await this.tasks.putIfAbsent(provisioned))) {
        this.logger.info(`provisioned task ${taskId.toString()} via taskprov`);
      }
    }

    return this.getTask(taskId);
  }

  protected authorize(
    expected: BearerToken | undefined,
    req: DapRequest,
  ): void {
    if (!tokenMatches(expected, req.senderAuth)) {
      throw new DapAbort("unauthorizedRequest", undefined, req.taskId);
    }
  }

  protected checkVersion(req: DapRequest): void {
    if (!SUPPORTED_VERSIONS.includes(req.version)) {
      throw new DapAbort(
        "invalidProtocolVersion",
        `unsupported version ${req.version}`,
        req.taskId,
      );
    }
  }

  protected checkTaskVersion(req: DapRequest, task: TaskConfig): void {
    if (req.version !== task.version) {
      throw new DapAbort(
        "invalidProtocolVersion",
        `task uses ${task.version}`,
        task.taskId,
      );
    }
  }

  protected checkMediaType(req: DapRequest, expected: string): void {
    if (req.mediaType !== expected) {
      throw new DapAbort(
        "invalidProtocolVersion",
        `expected media type ${expected}`,
        req.taskId,
      );
    }
  }

  protected decode<T>(
    Message: Parseable<T>,
    payload: Buffer,
    taskId?: TaskId,
  ): T {
    try {
      return Parser.complete(Message, payload);
    } catch (error) {
      throw new DapAbort(
        "unrecognizedMessage",
        error instanceof Error ? error.message : String(error),
        taskId,
      );
    }
  }

  /**
     Serves the HPKE configuration Clients encrypt input shares to. The
     task is named by the `task_id` query parameter.
  */
  async hpkeConfig(req: DapRequest): Promise<DapResponse> {
    this.checkVersion(req);
    const encodedTaskId = req.url.searchParams.get("task_id");

    if (encodedTaskId === null) {
      if (this.global.requireHpkeConfigTaskId) {
        throw new DapAbort("missingTaskId");
      }
    } else {
      let taskId: TaskId;
      try {
        taskId = new TaskId(encodedTaskId);
      } catch (error) {
        throw new DapAbort("unrecognizedMessage", String(error));
      }
      this.checkTaskVersion(req, await this.getTask(taskId));
    }

    return {
      mediaType: MEDIA_TYPES.HPKE_CONFIG,
      payload: this.hpkeConfigFor().encode(),
    };
  }

  /** The first receiver config whose KEM the deployment supports. */
  hpkeConfigFor(): HpkeConfig {
    const receiver = this.hpkeReceivers.find(({ config }) =>
      this.global.supportedHpkeKems.includes(config.kemId),
    );
    if (!receiver) {
      throw new Error("no HPKE receiver config uses a supported KEM");
    }
    return receiver.config;
  }

  /**
     Clears the replay sets of tasks that expired more than
     `replayRetention` seconds before `now`. Reports for them are
     refused on expiration alone.
  */
  async evictReplaySets(now: number = this.now()): Promise<number> {
    const retention = this.global.replayRetention;
    if (retention === null) return 0;

    let evicted = 0;
    for (const task of await this.tasks.list()) {
      if (now >= task.expiration + retention) {
        await this.reports.clearProcessed(task.taskId);
        evicted++;
      }
    }
    return evicted;
  }

  /**
     Runs the first preparation step for this aggregator's share of one
     report. Failures come back as values so sibling reports proceed.
     The Helper records the report in its replay set here; the Leader
     does so when it commits.
  */
  protected async prepareInit(
    task: TaskConfig,
    reportShare: ReportShare,
    aggregationParameter: Buffer,
    partialBatchSelector: PartialBatchSelector,
  ): Promise<PrepareInitResult> {
    const { metadata } = reportShare;
    const { reportId, time } = metadata;
    const { taskId } = task;
    const fail = (failure: TransitionFailure): PrepareInitResult => {
      this.logger.debug(
        `report ${reportId.toString()} rejected: ${TransitionFailure[failure]}`,
      );
      return { ok: false, reportId, failure };
    };

    if (task.isExpired(this.now()) || time >= task.expiration) {
      return fail(TransitionFailure.TaskExpired);
    }
    if (await this.reports.isProcessed(taskId, reportId)) {
      return fail(TransitionFailure.ReportReplayed);
    }
    const bucket = task.bucketFor(time, partialBatchSelector);
    if (await this.aggregates.isCollected(taskId, bucket)) {
      return fail(TransitionFailure.BatchCollected);
    }

    let inputShare: Buffer;
    try {
      inputShare = await openWithAny(
        this.hpkeReceivers,
        reportShare.encryptedInputShare,
        new InputShareInfo(this.role).encode(),
        new InputShareAad(taskId, metadata, reportShare.publicShare).encode(),
      );
    } catch (error) {
      if (!(error instanceof HpkeError)) throw error;
      return fail(
        error.kind === "unknownConfigId"
          ? TransitionFailure.HpkeUnknownConfigId
          : TransitionFailure.HpkeDecryptError,
      );
    }

    let prepared: { preparationState: Buffer; preparationShare: Buffer };
    try {
      prepared = await task.vdaf.prepareInit(
        task.verifyKey,
        this.role === Role.Leader ? 0 : 1,
        aggregationParameter,
        reportId.encode(),
        reportShare.publicShare,
        inputShare,
      );
    } catch (error) {
      if (!(error instanceof VdafError)) throw error;
      return fail(TransitionFailure.VdafPrepError);
    }

    if (
      this.role === Role.Helper &&
      !(await this.reports.tryMarkProcessed(taskId, reportId))
    ) {
      return fail(TransitionFailure.ReportReplayed);
    }

    return { ok: true, reportId, time, ...prepared };
  }

  /**
     Merges output shares into their buckets, one merge per bucket.
     Resolves to the outputs that landed; those of a bucket collected
     in the meantime are left out.
  */
  protected async commit(
    task: TaskConfig,
    partialBatchSelector: PartialBatchSelector,
    outputs: OutputShareEntry[],
  ): Promise<OutputShareEntry[]> {
    const byBucket = new Map<
      string,
      { bucket: BatchBucket; outputs: OutputShareEntry[] }
    >();
    for (const output of outputs) {
      const bucket = task.bucketFor(output.time, partialBatchSelector);
      const key = bucketKey(bucket);
      const group = byBucket.get(key);
      if (group) group.outputs.push(output);
      else byBucket.set(key, { bucket, outputs: [output] });
    }

    const committed: OutputShareEntry[] = [];
    for (const { bucket, outputs } of byBucket.values()) {
      const merged = await this.aggregates.merge(
        task,
        bucket,
        await AggregateShare.fromOutputShares(task.vdaf, outputs),
      );
      if (merged) {
        committed.push(...outputs);
      } else {
        this.logger.debug(
          `${outputs.length} reports rejected: ` +
            `bucket ${bucketKey(bucket)} collected`,
        );
      }
    }
    return committed;
  }

  protected async sealAggregateShare(
    task: TaskConfig,
    selector: BatchSelector,
    share: AggregateShare,
  ): Promise<HpkeCiphertext> {
    return task.collectorHpkeConfig.seal(
      new AggregateShareInfo(this.role).encode(),
      share.encode(task.vdaf),
      new AggregateShareAad(task.taskId, selector).encode(),
    );
  }
}
