import { Buffer } from "buffer";
import {
  BatchId,
  DapAbort,
  HpkeConfig,
  Interval,
  QueryType,
  TaskId,
  TimeIntervalQuery,
  type BatchSelector,
  type PartialBatchSelector,
  type Query,
  type QueryMode,
  type VdafConfig,
} from "@tally/dap";
import { Count, Sum, SumVec, type Vdaf } from "@tally/vdaf";
import type { GlobalConfig } from "./config.js";

export type TaskVdaf = Vdaf<unknown, unknown>;

/**
   The smallest collectible partition of a task's reports: one time
   window, or one fixed-size batch.
*/
export type BatchBucket =
  | { type: QueryType.TimeInterval; batchWindow: number }
  | { type: QueryType.FixedSize; batchId: BatchId };

export function bucketKey(bucket: BatchBucket): string {
  return bucket.type === QueryType.TimeInterval
    ? `window/${bucket.batchWindow}`
    : `batch/${bucket.batchId.toString()}`;
}

export function buildVdaf(config: VdafConfig): TaskVdaf {
  switch (config.type) {
    case "count":
      return new Count();
    case "sum":
      return new Sum({ bits: config.bits });
    case "sumVec":
      return new SumVec({ length: config.length, bits: config.bits });
  }
}

export interface TaskConfigParameters {
  taskId: TaskId;
  version: string;
  leaderUrl: URL | string;
  helperUrl: URL | string;
  collectorHpkeConfig: HpkeConfig;
  /** seconds; every batch boundary is a multiple of this */
  timePrecision: number;
  /** seconds since the epoch */
  expiration: number;
  minBatchSize: number;
  query: QueryMode;
  vdaf: VdafConfig;
  verifyKey: Buffer;
}

function withTrailingSlash(input: URL | string): URL {
  const url = new URL(input);
  if (!url.pathname.endsWith("/")) url.pathname += "/";
  return url;
}

/**
   The parameters Leader and Helper agree on for one task. Never
   changes once registered.
*/
export class TaskConfig {
  readonly taskId: TaskId;
  readonly version: string;
  readonly leaderUrl: URL;
  readonly helperUrl: URL;
  readonly collectorHpkeConfig: HpkeConfig;
  readonly timePrecision: number;
  readonly expiration: number;
  readonly minBatchSize: number;
  readonly query: QueryMode;
  readonly vdafConfig: VdafConfig;
  readonly vdaf: TaskVdaf;
  readonly verifyKey: Buffer;

  constructor(parameters: TaskConfigParameters) {
    const { timePrecision } = parameters;
    if (!Number.isInteger(timePrecision) || timePrecision < 1) {
      throw new Error("timePrecision must be a positive integer");
    }
    this.taskId = parameters.taskId;
    this.version = parameters.version;
    this.leaderUrl = withTrailingSlash(parameters.leaderUrl);
    this.helperUrl = withTrailingSlash(parameters.helperUrl);
    this.collectorHpkeConfig = parameters.collectorHpkeConfig;
    this.timePrecision = parameters.timePrecision;
    this.expiration = parameters.expiration;
    this.minBatchSize = parameters.minBatchSize;
    this.query = parameters.query;
    this.vdafConfig = parameters.vdaf;
    this.vdaf = buildVdaf(parameters.vdaf);
    this.verifyKey = parameters.verifyKey;
    if (this.verifyKey.length !== this.vdaf.verifyKeySize) {
      throw new Error(
        `verify key must be ${this.vdaf.verifyKeySize} bytes for ${this.vdafConfig.type}`,
      );
    }
  }

  get queryType(): QueryType {
    return this.query.type === "timeInterval"
      ? QueryType.TimeInterval
      : QueryType.FixedSize;
  }

  truncateTime(time: number): number {
    return time - (time % this.timePrecision);
  }

  /** The time-interval query covering the window that contains `now`. */
  queryForCurrentBatchWindow(now: number): TimeIntervalQuery {
    return new TimeIntervalQuery(
      new Interval(this.truncateTime(now), this.timePrecision),
    );
  }

  isExpired(now: number): boolean {
    return now >= this.expiration;
  }

  /**
     Checks that a query or batch selector is of this task's query type
     and names a batch that exists. `batchExists` is consulted for
     fixed-size queries only.
  */
  async validateQuery(
    query: Query | BatchSelector,
    batchExists: (batchId: BatchId) => Promise<boolean>,
  ): Promise<void> {
    if (query.type !== this.queryType) {
      throw new DapAbort("queryMismatch", undefined, this.taskId);
    }

    if (query.type === QueryType.FixedSize) {
      if (!(await batchExists(query.batchId))) {
        throw new DapAbort(
          "batchInvalid",
          `unknown batch ${query.batchId.toString()}`,
          this.taskId,
        );
      }
      return;
    }

    const { start, duration } = query.batchInterval;
    const precision = this.timePrecision;
    if (start % precision !== 0 || duration % precision !== 0) {
      throw new DapAbort(
        "batchInvalid",
        "batch interval is not aligned to the time precision",
        this.taskId,
      );
    }
  }

  /**
     Bounds a collect request's batch interval against the deployment's
     limits, relative to `now`.
  */
  validateBatchInterval(
    interval: Interval,
    now: number,
    config: GlobalConfig,
  ): void {
    this.checkBatchDuration(interval, config);
    if (interval.start < now - config.minBatchIntervalStart) {
      throw DapAbort.badRequest(
        "batch interval too far into past",
        this.taskId,
      );
    }
    if (interval.end > now + config.maxBatchIntervalEnd) {
      throw DapAbort.badRequest(
        "batch interval too far into future",
        this.taskId,
      );
    }
  }

  checkBatchDuration(interval: Interval, config: GlobalConfig): void {
    if (interval.duration > config.maxBatchDuration) {
      throw DapAbort.badRequest("batch interval too large", this.taskId);
    }
  }

  isReportCountCompatible(reportCount: number): boolean {
    if (reportCount < this.minBatchSize) return false;
    return (
      this.query.type === "timeInterval" ||
      reportCount <= this.query.maxBatchSize
    );
  }

  /** Every bucket a batch selector covers. */
  bucketsFor(selector: BatchSelector): BatchBucket[] {
    if (selector.type === QueryType.FixedSize) {
      return [{ type: QueryType.FixedSize, batchId: selector.batchId }];
    }

    const buckets: BatchBucket[] = [];
    const { start, end } = selector.batchInterval;
    for (
      let window = this.truncateTime(start);
      window < end;
      window += this.timePrecision
    ) {
      buckets.push({ type: QueryType.TimeInterval, batchWindow: window });
    }
    return buckets;
  }

  /** The bucket a report with timestamp `time` belongs to. */
  bucketFor(time: number, partialSelector: PartialBatchSelector): BatchBucket {
    return partialSelector.type === QueryType.FixedSize
      ? { type: QueryType.FixedSize, batchId: partialSelector.batchId }
      : { type: QueryType.TimeInterval, batchWindow: this.truncateTime(time) };
  }
}
