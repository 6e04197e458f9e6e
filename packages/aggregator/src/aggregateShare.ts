import { Buffer } from "buffer";
import { sha256, xor } from "@tally/common";
import type { ReportId } from "@tally/dap";
import type { AggregatorShare } from "@tally/vdaf";
import type { TaskVdaf } from "./task.js";

const CHECKSUM_SIZE = 32;

/**
   What one aggregator has accumulated for a bucket: the number of
   reports, the XOR of their SHA-256(report ID), and the sum of their
   output shares. An empty share has no `data`.
*/
export class AggregateShare {
  constructor(
    readonly reportCount: number = 0,
    readonly checksum: Buffer = Buffer.alloc(CHECKSUM_SIZE),
    readonly data?: AggregatorShare,
  ) {}

  static empty(): AggregateShare {
    return new AggregateShare();
  }

  /** Aggregates the output shares of the given reports. */
  static async fromOutputShares(
    vdaf: TaskVdaf,
    outputs: { reportId: ReportId; outputShare: bigint[] }[],
  ): Promise<AggregateShare> {
    let checksum = Buffer.alloc(CHECKSUM_SIZE);
    for (const { reportId } of outputs) {
      checksum = Buffer.from(xor(checksum, await sha256(reportId.encode())));
    }
    return new AggregateShare(
      outputs.length,
      checksum,
      outputs.length > 0
        ? vdaf.aggregate(outputs.map(({ outputShare }) => outputShare))
        : undefined,
    );
  }

  isEmpty(): boolean {
    return this.reportCount === 0;
  }

  merge(vdaf: TaskVdaf, other: AggregateShare): AggregateShare {
    let data: AggregatorShare | undefined;
    if (this.data && other.data) {
      data = vdaf.field.vecAdd(this.data, other.data);
    } else {
      data = this.data ?? other.data;
    }
    return new AggregateShare(
      this.reportCount + other.reportCount,
      Buffer.from(xor(this.checksum, other.checksum)),
      data,
    );
  }

  /** The share as the collector decodes it; zeros when empty. */
  encode(vdaf: TaskVdaf): Buffer {
    return vdaf.encodeAggregatorShare(
      this.data ?? new Array<bigint>(vdaf.outputLen).fill(0n),
    );
  }
}
