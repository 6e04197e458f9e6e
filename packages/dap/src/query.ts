import { Buffer } from "buffer";
import type { Encodable } from "./encoding.js";
import {
  Parser,
  type ParseSource,
  encodeUint8,
  encodeUint64,
} from "./encoding.js";
import { BatchId } from "./id.js";

export enum QueryType {
  TimeInterval = 1,
  FixedSize = 2,
}

export class Interval implements Encodable {
  constructor(
    public start: number,
    public duration: number,
  ) {}

  get end(): number {
    return this.start + this.duration;
  }

  static parse(source: ParseSource): Interval {
    const parser = Parser.from(source);
    return new Interval(parser.uint64(), parser.uint64());
  }

  encode(): Buffer {
    return Buffer.concat([
      encodeUint64(this.start),
      encodeUint64(this.duration),
    ]);
  }
}

export class TimeIntervalQuery implements Encodable {
  readonly type = QueryType.TimeInterval;
  constructor(public batchInterval: Interval) {}

  encode(): Buffer {
    return Buffer.concat([encodeUint8(this.type), this.batchInterval.encode()]);
  }
}

export class FixedSizeQuery implements Encodable {
  readonly type = QueryType.FixedSize;
  constructor(public batchId: BatchId) {}

  encode(): Buffer {
    return Buffer.concat([encodeUint8(this.type), this.batchId.encode()]);
  }
}

/**
   A Collector's query. The aggregators exchange the same structure
   as a {@linkcode BatchSelector} once the query has been resolved to
   a concrete batch.
*/
export type Query = TimeIntervalQuery | FixedSizeQuery;
export const Query = {
  parse(source: ParseSource): Query {
    const parser = Parser.from(source);
    const type = parser.uint8();
    switch (type) {
      case QueryType.TimeInterval:
        return new TimeIntervalQuery(Interval.parse(parser));
      case QueryType.FixedSize:
        return new FixedSizeQuery(BatchId.parse(parser));
      default:
        throw new Error(`unknown query type ${type}`);
    }
  },
};

export type BatchSelector = Query;
export const BatchSelector = Query;

export class TimeIntervalPartialSelector implements Encodable {
  readonly type = QueryType.TimeInterval;

  encode(): Buffer {
    return encodeUint8(this.type);
  }
}

export class FixedSizePartialSelector implements Encodable {
  readonly type = QueryType.FixedSize;
  constructor(public batchId: BatchId) {}

  encode(): Buffer {
    return Buffer.concat([encodeUint8(this.type), this.batchId.encode()]);
  }
}

/**
   Identifies the batch an aggregation job contributes to: nothing
   beyond the query type for time-interval tasks, since each report's
   timestamp picks its window, or the batch ID for fixed-size tasks.
*/
export type PartialBatchSelector =
  | TimeIntervalPartialSelector
  | FixedSizePartialSelector;
export const PartialBatchSelector = {
  parse(source: ParseSource): PartialBatchSelector {
    const parser = Parser.from(source);
    const type = parser.uint8();
    switch (type) {
      case QueryType.TimeInterval:
        return new TimeIntervalPartialSelector();
      case QueryType.FixedSize:
        return new FixedSizePartialSelector(BatchId.parse(parser));
      default:
        throw new Error(`unknown query type ${type}`);
    }
  },

  from(selector: BatchSelector): PartialBatchSelector {
    return selector.type === QueryType.TimeInterval
      ? new TimeIntervalPartialSelector()
      : new FixedSizePartialSelector(selector.batchId);
  },
};
