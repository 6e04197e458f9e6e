import { Buffer } from "buffer";
import type { Encodable } from "./encoding.js";
import {
  Parser,
  type ParseSource,
  encodeArray32,
  encodeOpaque16,
  encodeOpaque32,
  encodeUint8,
  encodeUint64,
} from "./encoding.js";
import { AggregationJobId, TaskId } from "./id.js";
import { ReportId } from "./reportId.js";
import { ReportShare } from "./report.js";
import { HpkeCiphertext } from "./ciphertext.js";
import { BatchSelector, PartialBatchSelector } from "./query.js";

/**
   Why an aggregator refused to aggregate one report. These travel
   inside an otherwise successful {@linkcode AggregateResp}.
*/
export enum TransitionFailure {
  BatchCollected = 0,
  ReportReplayed = 1,
  ReportDropped = 2,
  HpkeUnknownConfigId = 3,
  HpkeDecryptError = 4,
  VdafPrepError = 5,
  BatchSaturated = 6,
  TaskExpired = 7,
}

export enum TransitionType {
  Continued = 0,
  Finished = 1,
  Failed = 2,
}

export type TransitionVar =
  | { type: TransitionType.Continued; payload: Buffer }
  | { type: TransitionType.Finished }
  | { type: TransitionType.Failed; failure: TransitionFailure };

function parseFailure(value: number): TransitionFailure {
  if (!(value in TransitionFailure)) {
    throw new Error(`unknown transition failure ${value}`);
  }
  return value;
}

export class Transition implements Encodable {
  constructor(
    public reportId: ReportId,
    public variant: TransitionVar,
  ) {}

  static continued(reportId: ReportId, payload: Buffer): Transition {
    return new Transition(reportId, {
      type: TransitionType.Continued,
      payload,
    });
  }

  static finished(reportId: ReportId): Transition {
    return new Transition(reportId, { type: TransitionType.Finished });
  }

  static failed(reportId: ReportId, failure: TransitionFailure): Transition {
    return new Transition(reportId, { type: TransitionType.Failed, failure });
  }

  static parse(source: ParseSource): Transition {
    const parser = Parser.from(source);
    const reportId = ReportId.parse(parser);
    const type = parser.uint8();
    switch (type) {
      case TransitionType.Continued:
        return Transition.continued(reportId, parser.opaque32());
      case TransitionType.Finished:
        return Transition.finished(reportId);
      case TransitionType.Failed:
        return Transition.failed(reportId, parseFailure(parser.uint8()));
      default:
        throw new Error(`unknown transition type ${type}`);
    }
  }

  encode(): Buffer {
    const { variant } = this;
    const parts = [this.reportId.encode(), encodeUint8(variant.type)];
    if (variant.type === TransitionType.Continued) {
      parts.push(encodeOpaque32(variant.payload));
    } else if (variant.type === TransitionType.Failed) {
      parts.push(encodeUint8(variant.failure));
    }
    return Buffer.concat(parts);
  }
}

export class AggregateInitializeReq implements Encodable {
  constructor(
    public taskId: TaskId,
    public aggregationJobId: AggregationJobId,
    public aggregationParameter: Buffer,
    public partialBatchSelector: PartialBatchSelector,
    public reportShares: ReportShare[],
  ) {}

  static parse(source: ParseSource): AggregateInitializeReq {
    const parser = Parser.from(source);
    return new AggregateInitializeReq(
      TaskId.parse(parser),
      AggregationJobId.parse(parser),
      parser.opaque16(),
      PartialBatchSelector.parse(parser),
      parser.array32(ReportShare),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.taskId.encode(),
      this.aggregationJobId.encode(),
      encodeOpaque16(this.aggregationParameter),
      this.partialBatchSelector.encode(),
      encodeArray32(this.reportShares),
    ]);
  }
}

export class AggregateContinueReq implements Encodable {
  constructor(
    public taskId: TaskId,
    public aggregationJobId: AggregationJobId,
    public transitions: Transition[],
  ) {}

  static parse(source: ParseSource): AggregateContinueReq {
    const parser = Parser.from(source);
    return new AggregateContinueReq(
      TaskId.parse(parser),
      AggregationJobId.parse(parser),
      parser.array32(Transition),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.taskId.encode(),
      this.aggregationJobId.encode(),
      encodeArray32(this.transitions),
    ]);
  }
}

export class AggregateResp implements Encodable {
  constructor(public transitions: Transition[]) {}

  static parse(source: ParseSource): AggregateResp {
    return new AggregateResp(Parser.from(source).array32(Transition));
  }

  encode(): Buffer {
    return encodeArray32(this.transitions);
  }
}

export class AggregateShareReq implements Encodable {
  constructor(
    public taskId: TaskId,
    public batchSelector: BatchSelector,
    public aggregationParameter: Buffer,
    public reportCount: number,
    public checksum: Buffer,
  ) {
    if (checksum.length !== 32) {
      throw new Error("checksum must be 32 bytes");
    }
  }

  static parse(source: ParseSource): AggregateShareReq {
    const parser = Parser.from(source);
    return new AggregateShareReq(
      TaskId.parse(parser),
      BatchSelector.parse(parser),
      parser.opaque16(),
      parser.uint64(),
      parser.slice(32),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.taskId.encode(),
      this.batchSelector.encode(),
      encodeOpaque16(this.aggregationParameter),
      encodeUint64(this.reportCount),
      this.checksum,
    ]);
  }
}

export class AggregateShareResp implements Encodable {
  constructor(public encryptedAggregateShare: HpkeCiphertext) {}

  static parse(source: ParseSource): AggregateShareResp {
    return new AggregateShareResp(HpkeCiphertext.parse(source));
  }

  encode(): Buffer {
    return this.encryptedAggregateShare.encode();
  }
}
