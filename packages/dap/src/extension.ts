import { Buffer } from "buffer";
import type { Encodable } from "./encoding.js";
import { Parser, type ParseSource, encodeOpaque16 } from "./encoding.js";

export enum ExtensionType {
  Taskprov = 0xff00,
}

export class Extension implements Encodable {
  constructor(
    public extensionType: number,
    public data: Buffer,
  ) {
    if (
      !Number.isInteger(extensionType) ||
      extensionType < 0 ||
      extensionType > 0xffff
    ) {
      throw new Error("extensionType must be a uint16");
    }
  }

  static taskprov(payload: Buffer): Extension {
    return new Extension(ExtensionType.Taskprov, payload);
  }

  static parse(source: ParseSource): Extension {
    const parser = Parser.from(source);
    return new Extension(parser.uint16(), parser.opaque16());
  }

  encode(): Buffer {
    const type = Buffer.alloc(2);
    type.writeUInt16BE(this.extensionType, 0);
    return Buffer.concat([type, encodeOpaque16(this.data)]);
  }
}
