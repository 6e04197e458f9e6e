import { Buffer } from "buffer";
export interface Encodable {
  encode(): Buffer;
}

export function encodeArray16<T extends Encodable>(items: T[]): Buffer {
  const content = Buffer.concat([
    Buffer.alloc(2),
    ...items.map((item) => item.encode()),
  ]);
  content.writeUInt16BE(content.length - 2, 0);
  return content;
}

export function encodeArray32<T extends Encodable>(items: T[]): Buffer {
  const content = Buffer.concat([
    Buffer.alloc(4),
    ...items.map((item) => item.encode()),
  ]);
  content.writeUInt32BE(content.length - 4, 0);
  return content;
}

export function encodeOpaque8(buffer: Buffer): Buffer {
  return Buffer.concat([encodeUint8(buffer.length), buffer]);
}

export function encodeOpaque16(buffer: Buffer): Buffer {
  const returnBuffer = Buffer.concat([Buffer.alloc(2), buffer]);
  returnBuffer.writeUInt16BE(buffer.length, 0);
  return returnBuffer;
}

export function encodeOpaque32(buffer: Buffer): Buffer {
  const returnBuffer = Buffer.concat([Buffer.alloc(4), buffer]);
  returnBuffer.writeUInt32BE(buffer.length, 0);
  return returnBuffer;
}

export function encodeUint8(n: number): Buffer {
  const buffer = Buffer.alloc(1);
  buffer.writeUInt8(n, 0);
  return buffer;
}

export function encodeUint16(n: number): Buffer {
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16BE(n, 0);
  return buffer;
}

export function encodeUint32(n: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(n, 0);
  return buffer;
}

export function encodeUint64(n: number): Buffer {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new Error(`${n} is not a representable uint64`);
  }
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64BE(BigInt(n), 0);
  return buffer;
}

export type ParseSource = Parser | ArrayBuffer | Buffer;
interface Parseable<U> {
  parse(source: ParseSource): U;
}

export class Parser {
  index = 0;
  buffer: Buffer;

  static from(p: ParseSource): Parser {
    return p instanceof Parser ? p : new Parser(p);
  }

  /**
     Parses a complete message, failing if any bytes remain after it.
  */
  static complete<U>(Parseable: Parseable<U>, source: ArrayBuffer | Buffer): U {
    const parser = new Parser(source);
    const value = Parseable.parse(parser);
    if (parser.index !== parser.buffer.length) {
      throw new Error(
        `${parser.buffer.length - parser.index} unexpected trailing bytes`,
      );
    }
    return value;
  }

  constructor(buffer: Buffer | ArrayBuffer) {
    this.buffer = Buffer.from(buffer);
  }

  private increment<T>(bytes: number, fn: (this: Parser) => T): T {
    if (this.index + bytes > this.buffer.length) {
      throw new Error("attempted to read off end of buffer");
    }
    const ret = fn.call(this);
    this.index += bytes;
    return ret;
  }

  private list<T extends Parseable<U>, U>(Parseable: T, length: number): U[] {
    const endIndex = this.index + length;
    if (endIndex > this.buffer.length) {
      throw new Error("attempted to read off end of buffer");
    }
    const arr = [] as U[];

    while (this.index < endIndex) {
      arr.push(Parseable.parse(this));
    }

    if (this.index !== endIndex) {
      throw new Error(
        `expected to read exactly ${length} but read ${
          this.index - endIndex
        } over`,
      );
    }

    return arr;
  }

  array16<T extends Parseable<U>, U>(Parseable: T): U[] {
    return this.list(Parseable, this.uint16());
  }

  array32<T extends Parseable<U>, U>(Parseable: T): U[] {
    return this.list(Parseable, this.uint32());
  }

  slice(bytes: number): Buffer {
    return this.increment(bytes, () =>
      Buffer.from(this.buffer.subarray(this.index, this.index + bytes)),
    );
  }

  uint8(): number {
    return this.increment(1, () => this.buffer[this.index]);
  }

  uint16(): number {
    return this.increment(2, () => this.buffer.readUInt16BE(this.index));
  }

  uint32(): number {
    return this.increment(4, () => this.buffer.readUInt32BE(this.index));
  }

  uint64(): number {
    const n = this.increment(8, () => this.buffer.readBigUInt64BE(this.index));
    if (n > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new Error(`uint64 ${n} is too large to represent`);
    }
    return Number(n);
  }

  opaque8(): Buffer {
    return this.slice(this.uint8());
  }

  opaque16(): Buffer {
    return this.slice(this.uint16());
  }

  opaque32(): Buffer {
    return this.slice(this.uint32());
  }
}
