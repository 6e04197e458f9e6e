import { Buffer } from "buffer";
import { TaskId } from "./id.js";
import type { Encodable } from "./encoding.js";
import {
  Parser,
  type ParseSource,
  encodeArray32,
  encodeArray16,
  encodeOpaque32,
  encodeUint64,
} from "./encoding.js";
import { ReportId } from "./reportId.js";
import { HpkeCiphertext } from "./ciphertext.js";
import { DAP_VERSION, Role } from "./constants.js";
import { Extension, ExtensionType } from "./extension.js";
import type { BatchSelector } from "./query.js";

export class ReportMetadata implements Encodable {
  constructor(
    public reportId: ReportId,
    public time: number,
    public extensions: Extension[] = [],
  ) {}

  static parse(source: ParseSource): ReportMetadata {
    const parser = Parser.from(source);
    return new ReportMetadata(
      ReportId.parse(parser),
      parser.uint64(),
      parser.array16(Extension),
    );
  }

  /** the payload of the first taskprov extension, if there is one */
  taskprovPayload(): Buffer | undefined {
    return this.extensions.find(
      ({ extensionType }) => extensionType === ExtensionType.Taskprov,
    )?.data;
  }

  encode(): Buffer {
    return Buffer.concat([
      this.reportId.encode(),
      encodeUint64(this.time),
      encodeArray16(this.extensions),
    ]);
  }
}

export class Report implements Encodable {
  constructor(
    public taskId: TaskId,
    public metadata: ReportMetadata,
    public publicShare: Buffer,
    public encryptedInputShares: HpkeCiphertext[],
  ) {}

  static parse(source: ParseSource): Report {
    const parser = Parser.from(source);
    return new Report(
      TaskId.parse(parser),
      ReportMetadata.parse(parser),
      parser.opaque32(),
      parser.array32(HpkeCiphertext),
    );
  }

  /** the share of this report destined for the aggregator in `role` */
  shareFor(role: Role.Leader | Role.Helper): ReportShare {
    const index = role === Role.Leader ? 0 : 1;
    const share = this.encryptedInputShares[index];
    if (!share) {
      throw new Error(`report has no input share at index ${index}`);
    }
    return new ReportShare(this.metadata, this.publicShare, share);
  }

  encode(): Buffer {
    return Buffer.concat([
      this.taskId.encode(),
      this.metadata.encode(),
      encodeOpaque32(this.publicShare),
      encodeArray32(this.encryptedInputShares),
    ]);
  }
}

/**
   The part of a {@linkcode Report} one aggregator needs: its metadata,
   public share and the single input share sealed to that aggregator.
*/
export class ReportShare implements Encodable {
  constructor(
    public metadata: ReportMetadata,
    public publicShare: Buffer,
    public encryptedInputShare: HpkeCiphertext,
  ) {}

  static parse(source: ParseSource): ReportShare {
    const parser = Parser.from(source);
    return new ReportShare(
      ReportMetadata.parse(parser),
      parser.opaque32(),
      HpkeCiphertext.parse(parser),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.metadata.encode(),
      encodeOpaque32(this.publicShare),
      this.encryptedInputShare.encode(),
    ]);
  }
}

export class InputShareAad implements Encodable {
  constructor(
    public taskId: TaskId,
    public metadata: ReportMetadata,
    public publicShare: Buffer,
  ) {}

  encode(): Buffer {
    return Buffer.concat([
      this.taskId.encode(),
      this.metadata.encode(),
      encodeOpaque32(this.publicShare),
    ]);
  }
}

/** A Buffer that will always equal `${DAP_VERSION} input share` */
const INPUT_SHARE_ASCII = Buffer.from(`${DAP_VERSION} input share`, "ascii");

export class InputShareInfo implements Encodable {
  constructor(public serverRole: Role) {}
  encode(): Buffer {
    return Buffer.concat([
      INPUT_SHARE_ASCII,
      Buffer.from([Role.Client, this.serverRole]),
    ]);
  }
}

export class AggregateShareAad implements Encodable {
  constructor(
    public taskId: TaskId,
    public batchSelector: BatchSelector,
  ) {}

  encode(): Buffer {
    return Buffer.concat([this.taskId.encode(), this.batchSelector.encode()]);
  }
}

const AGGREGATE_SHARE_ASCII = Buffer.from(
  `${DAP_VERSION} aggregate share`,
  "ascii",
);

export class AggregateShareInfo implements Encodable {
  constructor(public serverRole: Role) {}
  encode(): Buffer {
    return Buffer.concat([
      AGGREGATE_SHARE_ASCII,
      Buffer.from([this.serverRole, Role.Collector]),
    ]);
  }
}
