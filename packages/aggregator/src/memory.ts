import type { Buffer } from "buffer";
import {
  BatchId,
  DapAbort,
  type AggregationJobId,
  type CollectReq,
  type CollectResp,
  type CollectionJobId,
  type PartialBatchSelector,
  type Report,
  type ReportId,
  TaskId,
} from "@tally/dap";
import { AggregateShare } from "./aggregateShare.js";
import { bucketKey, type BatchBucket, type TaskConfig } from "./task.js";
import type {
  AggregateStore,
  CollectJob,
  CollectJobStore,
  HelperStateStore,
  PendingCollectJob,
  ReportGroup,
  ReportStore,
  TaskStore,
} from "./storage.js";

// None of these methods await, so each runs to completion before any
// other request is handled.

export class MemoryTaskStore implements TaskStore {
  private tasks = new Map<string, TaskConfig>();

  constructor(tasks: TaskConfig[] = []) {
    for (const task of tasks) this.tasks.set(task.taskId.toString(), task);
  }

  async get(taskId: TaskId): Promise<TaskConfig | undefined> {
    return this.tasks.get(taskId.toString());
  }

  async putIfAbsent(task: TaskConfig): Promise<boolean> {
    const key = task.taskId.toString();
    if (this.tasks.has(key)) return false;
    this.tasks.set(key, task);
    return true;
  }

  async list(): Promise<TaskConfig[]> {
    return [...this.tasks.values()];
  }
}

function selectorKey(selector: PartialBatchSelector): string {
  return selector.encode().toString("base64url");
}

export class MemoryReportStore implements ReportStore {
  private queues = new Map<string, Map<string, ReportGroup>>();
  private processed = new Map<string, Set<string>>();
  private batches = new Map<string, { batchId: BatchId; count: number }>();

  async enqueue(
    taskId: TaskId,
    partialBatchSelector: PartialBatchSelector,
    report: Report,
  ): Promise<void> {
    const taskKey = taskId.toString();
    let groups = this.queues.get(taskKey);
    if (!groups) {
      groups = new Map();
      this.queues.set(taskKey, groups);
    }
    const key = selectorKey(partialBatchSelector);
    const group = groups.get(key);
    if (group) {
      group.reports.push(report);
    } else {
      groups.set(key, { partialBatchSelector, reports: [report] });
    }
  }

  async drain(taskId: TaskId): Promise<ReportGroup[]> {
    const taskKey = taskId.toString();
    const groups = this.queues.get(taskKey);
    this.queues.delete(taskKey);
    return groups ? [...groups.values()] : [];
  }

  async pendingTasks(): Promise<TaskId[]> {
    return [...this.queues.keys()].map((key) => new TaskId(key));
  }

  async isProcessed(taskId: TaskId, reportId: ReportId): Promise<boolean> {
    return !!this.processed.get(taskId.toString())?.has(reportId.toString());
  }

  async tryMarkProcessed(taskId: TaskId, reportId: ReportId): Promise<boolean> {
    const taskKey = taskId.toString();
    let processed = this.processed.get(taskKey);
    if (!processed) {
      processed = new Set();
      this.processed.set(taskKey, processed);
    }
    if (processed.has(reportId.toString())) return false;
    processed.add(reportId.toString());
    return true;
  }

  async clearProcessed(taskId: TaskId): Promise<void> {
    this.processed.delete(taskId.toString());
  }

  async assignBatch(taskId: TaskId, maxBatchSize: number): Promise<BatchId> {
    const taskKey = taskId.toString();
    let current = this.batches.get(taskKey);
    if (!current || current.count >= maxBatchSize) {
      current = { batchId: BatchId.random(), count: 0 };
      this.batches.set(taskKey, current);
    }
    current.count++;
    return current.batchId;
  }

  async currentBatch(taskId: TaskId): Promise<BatchId | undefined> {
    return this.batches.get(taskId.toString())?.batchId;
  }
}

export class MemoryHelperStateStore implements HelperStateStore {
  // null marks a claimed job whose state is still being prepared
  private states = new Map<string, Buffer | null>();

  private key(taskId: TaskId, jobId: AggregationJobId): string {
    return `${taskId.toString()}/${jobId.toString()}`;
  }

  async claim(taskId: TaskId, jobId: AggregationJobId): Promise<boolean> {
    const key = this.key(taskId, jobId);
    if (this.states.has(key)) return false;
    this.states.set(key, null);
    return true;
  }

  async put(
    taskId: TaskId,
    jobId: AggregationJobId,
    state: Buffer,
  ): Promise<void> {
    this.states.set(this.key(taskId, jobId), state);
  }

  async release(taskId: TaskId, jobId: AggregationJobId): Promise<void> {
    const key = this.key(taskId, jobId);
    if (this.states.get(key) === null) this.states.delete(key);
  }

  async take(
    taskId: TaskId,
    jobId: AggregationJobId,
  ): Promise<Buffer | undefined> {
    const key = this.key(taskId, jobId);
    const state = this.states.get(key);
    if (!state) return undefined;
    this.states.delete(key);
    return state;
  }
}

interface BucketEntry {
  share: AggregateShare;
  collected: boolean;
}

export class MemoryAggregateStore implements AggregateStore {
  private buckets = new Map<string, Map<string, BucketEntry>>();

  private entries(taskId: TaskId): Map<string, BucketEntry> {
    const taskKey = taskId.toString();
    let entries = this.buckets.get(taskKey);
    if (!entries) {
      entries = new Map();
      this.buckets.set(taskKey, entries);
    }
    return entries;
  }

  async merge(
    task: TaskConfig,
    bucket: BatchBucket,
    share: AggregateShare,
  ): Promise<boolean> {
    const entries = this.entries(task.taskId);
    const key = bucketKey(bucket);
    const entry = entries.get(key);
    if (entry?.collected) return false;
    entries.set(key, {
      share: (entry?.share ?? AggregateShare.empty()).merge(task.vdaf, share),
      collected: false,
    });
    return true;
  }

  async getAggShare(
    task: TaskConfig,
    buckets: BatchBucket[],
  ): Promise<AggregateShare> {
    return this.sum(task, buckets);
  }

  private sum(task: TaskConfig, buckets: BatchBucket[]): AggregateShare {
    const entries = this.entries(task.taskId);
    return buckets.reduce(
      (total, bucket) => {
        const entry = entries.get(bucketKey(bucket));
        return entry ? total.merge(task.vdaf, entry.share) : total;
      },
      AggregateShare.empty(),
    );
  }

  async isCollected(taskId: TaskId, bucket: BatchBucket): Promise<boolean> {
    return !!this.entries(taskId).get(bucketKey(bucket))?.collected;
  }

  async isOverlapping(
    taskId: TaskId,
    buckets: BatchBucket[],
  ): Promise<boolean> {
    const entries = this.entries(taskId);
    return buckets.some((bucket) => entries.get(bucketKey(bucket))?.collected);
  }

  async markCollected(taskId: TaskId, buckets: BatchBucket[]): Promise<void> {
    this.setCollected(taskId, buckets);
  }

  async collect(
    task: TaskConfig,
    buckets: BatchBucket[],
    accept?: (share: AggregateShare) => void,
  ): Promise<AggregateShare> {
    const entries = this.entries(task.taskId);
    if (buckets.some((bucket) => entries.get(bucketKey(bucket))?.collected)) {
      throw new DapAbort("batchOverlap", undefined, task.taskId);
    }
    const share = this.sum(task, buckets);
    accept?.(share);
    this.setCollected(task.taskId, buckets);
    return share;
  }

  private setCollected(taskId: TaskId, buckets: BatchBucket[]): void {
    const entries = this.entries(taskId);
    if (buckets.some((bucket) => entries.get(bucketKey(bucket))?.collected)) {
      throw new DapAbort("batchOverlap", undefined, taskId);
    }
    for (const bucket of buckets) {
      const key = bucketKey(bucket);
      entries.set(key, {
        share: entries.get(key)?.share ?? AggregateShare.empty(),
        collected: true,
      });
    }
  }

  async batchExists(taskId: TaskId, batchId: BatchId): Promise<boolean> {
    return this.entries(taskId).has(`batch/${batchId.toString()}`);
  }
}

interface CollectJobEntry extends PendingCollectJob {
  response?: CollectResp;
  finishedAt?: number;
}

export class MemoryCollectJobStore implements CollectJobStore {
  private jobs = new Map<string, CollectJobEntry>();

  private key(taskId: TaskId, collectId: CollectionJobId): string {
    return `${taskId.toString()}/${collectId.toString()}`;
  }

  async create(
    taskId: TaskId,
    collectId: CollectionJobId,
    request: CollectReq,
  ): Promise<void> {
    const key = this.key(taskId, collectId);
    if (this.jobs.has(key)) {
      throw new Error(`collect job ${key} already exists`);
    }
    this.jobs.set(key, { taskId, collectId, request });
  }

  async get(taskId: TaskId, collectId: CollectionJobId): Promise<CollectJob> {
    const job = this.jobs.get(this.key(taskId, collectId));
    if (!job) return { status: "unknown" };
    if (!job.response) return { status: "pending" };
    return { status: "done", response: job.response };
  }

  async pending(): Promise<PendingCollectJob[]> {
    return [...this.jobs.values()]
      .filter((job) => !job.response)
      .map(({ taskId, collectId, request, share }) => ({
        taskId,
        collectId,
        request,
        share,
      }));
  }

  async recordShare(
    taskId: TaskId,
    collectId: CollectionJobId,
    share: AggregateShare,
  ): Promise<void> {
    this.job(taskId, collectId).share = share;
  }

  private job(taskId: TaskId, collectId: CollectionJobId): CollectJobEntry {
    const job = this.jobs.get(this.key(taskId, collectId));
    if (!job) {
      throw new Error(
        `no collect job ${collectId.toString()} for task ${taskId.toString()}`,
      );
    }
    return job;
  }

  async finish(
    taskId: TaskId,
    collectId: CollectionJobId,
    response: CollectResp,
    now: number,
  ): Promise<void> {
    const job = this.job(taskId, collectId);
    if (job.response) {
      throw new Error(`collect job ${collectId.toString()} is already done`);
    }
    job.response = response;
    job.finishedAt = now;
  }

  async evictFinishedBefore(cutoff: number): Promise<number> {
    let evicted = 0;
    for (const [key, job] of this.jobs) {
      if (job.finishedAt !== undefined && job.finishedAt < cutoff) {
        this.jobs.delete(key);
        evicted++;
      }
    }
    return evicted;
  }
}
