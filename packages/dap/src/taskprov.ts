import { Buffer } from "buffer";
import { sha256 } from "@tally/common";
import type { Encodable } from "./encoding.js";
import {
  Parser,
  type ParseSource,
  encodeArray16,
  encodeOpaque8,
  encodeOpaque16,
  encodeUint8,
  encodeUint16,
  encodeUint32,
  encodeUint64,
} from "./encoding.js";
import { TaskId } from "./id.js";
import { QueryType } from "./query.js";

export enum VdafType {
  Count = 0,
  Sum = 1,
  SumVec = 2,
}

export type VdafConfig =
  | { type: "count" }
  | { type: "sum"; bits: number }
  | { type: "sumVec"; length: number; bits: number };

export type QueryMode =
  | { type: "timeInterval" }
  | { type: "fixedSize"; maxBatchSize: number };

/** Differential privacy mechanisms. Only "none" is defined. */
const DP_CONFIG_NONE = 1;

export class UrlBytes implements Encodable {
  constructor(public url: string) {}

  static parse(source: ParseSource): UrlBytes {
    return new UrlBytes(Parser.from(source).opaque16().toString("ascii"));
  }

  encode(): Buffer {
    return encodeOpaque16(Buffer.from(this.url, "ascii"));
  }
}

export class TaskprovQueryConfig implements Encodable {
  constructor(
    public timePrecision: number,
    public maxBatchQueryCount: number,
    public minBatchSize: number,
    public query: QueryMode,
  ) {}

  static parse(source: ParseSource): TaskprovQueryConfig {
    const parser = Parser.from(source);
    const timePrecision = parser.uint64();
    const maxBatchQueryCount = parser.uint16();
    const minBatchSize = parser.uint32();
    const type = parser.uint8();
    let query: QueryMode;
    switch (type) {
      case QueryType.TimeInterval:
        query = { type: "timeInterval" };
        break;
      case QueryType.FixedSize:
        query = { type: "fixedSize", maxBatchSize: parser.uint32() };
        break;
      default:
        throw new Error(`unknown query type ${type}`);
    }
    return new TaskprovQueryConfig(
      timePrecision,
      maxBatchQueryCount,
      minBatchSize,
      query,
    );
  }

  encode(): Buffer {
    const { query } = this;
    return Buffer.concat([
      encodeUint64(this.timePrecision),
      encodeUint16(this.maxBatchQueryCount),
      encodeUint32(this.minBatchSize),
      query.type === "timeInterval"
        ? encodeUint8(QueryType.TimeInterval)
        : Buffer.concat([
            encodeUint8(QueryType.FixedSize),
            encodeUint32(query.maxBatchSize),
          ]),
    ]);
  }
}

export class TaskprovVdafConfig implements Encodable {
  constructor(public vdaf: VdafConfig) {}

  static parse(source: ParseSource): TaskprovVdafConfig {
    const parser = Parser.from(source);
    const dpConfig = parser.uint8();
    if (dpConfig !== DP_CONFIG_NONE) {
      throw new Error(`unsupported dp config ${dpConfig}`);
    }
    const type = parser.uint32();
    switch (type) {
      case VdafType.Count:
        return new TaskprovVdafConfig({ type: "count" });
      case VdafType.Sum:
        return new TaskprovVdafConfig({ type: "sum", bits: parser.uint8() });
      case VdafType.SumVec:
        return new TaskprovVdafConfig({
          type: "sumVec",
          length: parser.uint32(),
          bits: parser.uint8(),
        });
      default:
        throw new Error(`unknown vdaf type ${type}`);
    }
  }

  encode(): Buffer {
    const { vdaf } = this;
    const dp = encodeUint8(DP_CONFIG_NONE);
    switch (vdaf.type) {
      case "count":
        return Buffer.concat([dp, encodeUint32(VdafType.Count)]);
      case "sum":
        return Buffer.concat([
          dp,
          encodeUint32(VdafType.Sum),
          encodeUint8(vdaf.bits),
        ]);
      case "sumVec":
        return Buffer.concat([
          dp,
          encodeUint32(VdafType.SumVec),
          encodeUint32(vdaf.length),
          encodeUint8(vdaf.bits),
        ]);
    }
  }
}

/**
   The self-describing task definition a Client attaches to its report
   so that aggregators can provision the task on first sight.
*/
export class TaskprovConfig implements Encodable {
  constructor(
    public taskInfo: Buffer,
    public aggregatorEndpoints: UrlBytes[],
    public queryConfig: TaskprovQueryConfig,
    public taskExpiration: number,
    public vdafConfig: TaskprovVdafConfig,
  ) {}

  static parse(source: ParseSource): TaskprovConfig {
    const parser = Parser.from(source);
    return new TaskprovConfig(
      parser.opaque8(),
      parser.array16(UrlBytes),
      TaskprovQueryConfig.parse(parser),
      parser.uint64(),
      TaskprovVdafConfig.parse(parser),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      encodeOpaque8(this.taskInfo),
      encodeArray16(this.aggregatorEndpoints),
      this.queryConfig.encode(),
      encodeUint64(this.taskExpiration),
      this.vdafConfig.encode(),
    ]);
  }
}

/** The task ID a taskprov payload provisions: SHA-256 of its bytes. */
export async function computeTaskId(payload: Buffer): Promise<TaskId> {
  return new TaskId(Buffer.from(await sha256(payload)));
}
