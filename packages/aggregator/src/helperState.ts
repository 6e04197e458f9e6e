import { Buffer } from "buffer";
import {
  Parser,
  PartialBatchSelector,
  ReportId,
  encodeArray32,
  encodeOpaque16,
  encodeOpaque32,
  encodeUint64,
  type Encodable,
  type ParseSource,
} from "@tally/dap";

export class HelperReportState implements Encodable {
  constructor(
    public reportId: ReportId,
    public time: number,
    public preparationState: Buffer,
  ) {}

  static parse(source: ParseSource): HelperReportState {
    const parser = Parser.from(source);
    return new HelperReportState(
      ReportId.parse(parser),
      parser.uint64(),
      parser.opaque32(),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.reportId.encode(),
      encodeUint64(this.time),
      encodeOpaque32(this.preparationState),
    ]);
  }
}

/**
   What the Helper keeps between the initialize and continue steps of
   one aggregation job, in the order the Leader sent the reports.
*/
export class HelperState implements Encodable {
  constructor(
    public partialBatchSelector: PartialBatchSelector,
    public aggregationParameter: Buffer,
    public reports: HelperReportState[],
  ) {}

  static parse(source: ParseSource): HelperState {
    const parser = Parser.from(source);
    return new HelperState(
      PartialBatchSelector.parse(parser),
      parser.opaque16(),
      parser.array32(HelperReportState),
    );
  }

  encode(): Buffer {
    return Buffer.concat([
      this.partialBatchSelector.encode(),
      encodeOpaque16(this.aggregationParameter),
      encodeArray32(this.reports),
    ]);
  }
}
