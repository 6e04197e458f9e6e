import { Buffer } from "buffer";
import type { Encodable } from "./encoding.js";
import {
  Parser,
  type ParseSource,
  encodeArray32,
  encodeOpaque16,
  encodeUint64,
} from "./encoding.js";
import { TaskId } from "./id.js";
import { HpkeCiphertext } from "./ciphertext.js";
import { PartialBatchSelector, Query } from "./query.js";

export class CollectReq implements Encodable {
  constructor(
    public taskId: TaskId,
    public query: Query,
    public aggregationParameter: Buffer = Buffer.alloc(0),
  ) {}

  static parse(source: ParseSource): CollectReq {
    const parser = Parser.from(source);
    return new CollectReq(
      TaskId.parse(parser),
      Query.parse(parser),
      parser.opaque16(),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.taskId.encode(),
      this.query.encode(),
      encodeOpaque16(this.aggregationParameter),
    ]);
  }
}

/**
   The result of a collect job: the report count and one encrypted
   aggregate share per aggregator, Leader first.
*/
export class CollectResp implements Encodable {
  constructor(
    public partialBatchSelector: PartialBatchSelector,
    public reportCount: number,
    public encryptedAggregateShares: HpkeCiphertext[],
  ) {}

  static parse(source: ParseSource): CollectResp {
    const parser = Parser.from(source);
    return new CollectResp(
      PartialBatchSelector.parse(parser),
      parser.uint64(),
      parser.array32(HpkeCiphertext),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.partialBatchSelector.encode(),
      encodeUint64(this.reportCount),
      encodeArray32(this.encryptedAggregateShares),
    ]);
  }
}
