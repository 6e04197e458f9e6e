import { Buffer } from "buffer";
import { randomBytes } from "@tally/common";
import { Parser, type ParseSource } from "./encoding.js";
import { Id } from "./id.js";

export class ReportId extends Id {
  constructor(input: Buffer | string) {
    super(input, 16);
  }

  static random(): ReportId {
    return new ReportId(Buffer.from(randomBytes(16)));
  }

  static parse(source: ParseSource): ReportId {
    return new ReportId(Parser.from(source).slice(16));
  }
}
