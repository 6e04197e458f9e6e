import type { Buffer } from "buffer";
import type {
  AggregationJobId,
  BatchId,
  CollectReq,
  CollectResp,
  CollectionJobId,
  PartialBatchSelector,
  Report,
  ReportId,
  TaskId,
} from "@tally/dap";
import type { AggregateShare } from "./aggregateShare.js";
import type { BatchBucket, TaskConfig } from "./task.js";

/*
  Storage contracts the roles depend on. Each method marked atomic must
  perform its check and its write without another caller observing the
  state in between; an in-process implementation does this by never
  awaiting inside the method, a database one with a transaction.
*/

export interface TaskStore {
  get(taskId: TaskId): Promise<TaskConfig | undefined>;
  /** atomic; false when a task with this ID is already registered */
  putIfAbsent(task: TaskConfig): Promise<boolean>;
  list(): Promise<TaskConfig[]>;
}

export interface ReportGroup {
  partialBatchSelector: PartialBatchSelector;
  reports: Report[];
}

export interface ReportStore {
  enqueue(
    taskId: TaskId,
    partialBatchSelector: PartialBatchSelector,
    report: Report,
  ): Promise<void>;
  /** removes and returns every queued report of the task */
  drain(taskId: TaskId): Promise<ReportGroup[]>;
  /** task IDs that have at least one queued report */
  pendingTasks(): Promise<TaskId[]>;
  isProcessed(taskId: TaskId, reportId: ReportId): Promise<boolean>;
  /** atomic; false when the report was already marked */
  tryMarkProcessed(taskId: TaskId, reportId: ReportId): Promise<boolean>;
  clearProcessed(taskId: TaskId): Promise<void>;
  /**
     atomic; the batch the next report of a fixed-size task joins,
     opening a new one once `maxBatchSize` reports have been assigned
  */
  assignBatch(taskId: TaskId, maxBatchSize: number): Promise<BatchId>;
  currentBatch(taskId: TaskId): Promise<BatchId | undefined>;
}

export interface HelperStateStore {
  /** atomic; reserves the job ID, false when it is already in use */
  claim(taskId: TaskId, jobId: AggregationJobId): Promise<boolean>;
  put(taskId: TaskId, jobId: AggregationJobId, state: Buffer): Promise<void>;
  /** frees a claimed job ID that never received its state */
  release(taskId: TaskId, jobId: AggregationJobId): Promise<void>;
  /**
     atomic; returns and removes the state. A job that is claimed but
     has no state yet is left in place and reads as absent.
  */
  take(taskId: TaskId, jobId: AggregationJobId): Promise<Buffer | undefined>;
}

export interface AggregateStore {
  /** atomic; false, with nothing merged, when the bucket is collected */
  merge(
    task: TaskConfig,
    bucket: BatchBucket,
    share: AggregateShare,
  ): Promise<boolean>;
  getAggShare(
    task: TaskConfig,
    buckets: BatchBucket[],
  ): Promise<AggregateShare>;
  isCollected(taskId: TaskId, bucket: BatchBucket): Promise<boolean>;
  isOverlapping(taskId: TaskId, buckets: BatchBucket[]): Promise<boolean>;
  /** atomic; throws `batchOverlap` when any bucket is already collected */
  markCollected(taskId: TaskId, buckets: BatchBucket[]): Promise<void>;
  /**
     atomic; marks the buckets collected and returns their combined
     share, so that every merge either lands in that share or is
     refused. `accept` sees the share first and may throw to leave the
     buckets untouched. Throws `batchOverlap` when any bucket is
     already collected.
  */
  collect(
    task: TaskConfig,
    buckets: BatchBucket[],
    accept?: (share: AggregateShare) => void,
  ): Promise<AggregateShare>;
  batchExists(taskId: TaskId, batchId: BatchId): Promise<boolean>;
}

export type CollectJob =
  | { status: "unknown" }
  | { status: "pending" }
  | { status: "done"; response: CollectResp };

export interface PendingCollectJob {
  taskId: TaskId;
  collectId: CollectionJobId;
  request: CollectReq;
  /** the Leader's share, once its buckets have been collected */
  share?: AggregateShare;
}

export interface CollectJobStore {
  create(
    taskId: TaskId,
    collectId: CollectionJobId,
    request: CollectReq,
  ): Promise<void>;
  get(taskId: TaskId, collectId: CollectionJobId): Promise<CollectJob>;
  pending(): Promise<PendingCollectJob[]>;
  recordShare(
    taskId: TaskId,
    collectId: CollectionJobId,
    share: AggregateShare,
  ): Promise<void>;
  /** `now` is recorded for retention */
  finish(
    taskId: TaskId,
    collectId: CollectionJobId,
    response: CollectResp,
    now: number,
  ): Promise<void>;
  /** drops Done jobs finished before `cutoff`; returns how many */
  evictFinishedBefore(cutoff: number): Promise<number>;
}
