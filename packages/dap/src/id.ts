import { Buffer } from "buffer";
import { randomBytes } from "@tally/common";
import type { Encodable } from "./encoding.js";
import { Parser, type ParseSource } from "./encoding.js";

/**
   Fixed-width opaque identifier with a base64url text form, as used
   in URLs and configuration files.
*/
export abstract class Id implements Encodable {
  readonly buffer: Buffer;

  constructor(input: Buffer | string, length: number) {
    this.buffer =
      typeof input === "string" ? Buffer.from(input, "base64url") : input;

    if (this.buffer.length !== length) {
      throw new Error(
        `expected ${this.constructor.name} to be ${length} bytes long (${this.toString()})`,
      );
    }
  }

  toString(): string {
    return this.buffer.toString("base64url");
  }

  encode(): Buffer {
    return this.buffer;
  }

  equals(other: Id): boolean {
    return this.buffer.equals(other.buffer);
  }
}

export class TaskId extends Id {
  constructor(input: Buffer | string) {
    super(input, 32);
  }

  static random(): TaskId {
    return new TaskId(Buffer.from(randomBytes(32)));
  }

  static parse(source: ParseSource): TaskId {
    return new TaskId(Parser.from(source).slice(32));
  }
}

export class BatchId extends Id {
  constructor(input: Buffer | string) {
    super(input, 32);
  }

  static random(): BatchId {
    return new BatchId(Buffer.from(randomBytes(32)));
  }

  static parse(source: ParseSource): BatchId {
    return new BatchId(Parser.from(source).slice(32));
  }
}

export class AggregationJobId extends Id {
  constructor(input: Buffer | string) {
    super(input, 32);
  }

  static random(): AggregationJobId {
    return new AggregationJobId(Buffer.from(randomBytes(32)));
  }

  static parse(source: ParseSource): AggregationJobId {
    return new AggregationJobId(Parser.from(source).slice(32));
  }
}

export class CollectionJobId extends Id {
  constructor(input: Buffer | string) {
    super(input, 32);
  }

  static random(): CollectionJobId {
    return new CollectionJobId(Buffer.from(randomBytes(32)));
  }

  static parse(source: ParseSource): CollectionJobId {
    return new CollectionJobId(Parser.from(source).slice(32));
  }
}
