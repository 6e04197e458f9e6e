import { AdditiveVdaf } from "./additive.js";

export class Count extends AdditiveVdaf<boolean, number> {
  readonly id = 0;
  readonly outputLen = 1;

  encodeMeasurement(measurement: boolean): bigint[] {
    if (typeof measurement !== "boolean") {
      throw new Error("expected count measurement to be a boolean");
    }
    return [measurement ? 1n : 0n];
  }

  decodeResult(output: bigint[], _measurementCount: number): number {
    return Number(output[0]);
  }
}

export class Sum extends AdditiveVdaf<number | bigint, bigint> {
  readonly id = 1;
  readonly outputLen = 1;
  public readonly bits: number;

  constructor({ bits }: { bits: number }) {
    super();
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new Error("bits must be an integer in [1, 32]");
    }
    this.bits = bits;
  }

  encodeMeasurement(measurement: number | bigint): bigint[] {
    return [inRange(measurement, this.bits)];
  }

  decodeResult(output: bigint[], _measurementCount: number): bigint {
    return output[0];
  }
}

export class SumVec extends AdditiveVdaf<number[], number[]> {
  readonly id = 2;
  readonly outputLen: number;
  public readonly length: number;
  public readonly bits: number;

  constructor({ length, bits }: { length: number; bits: number }) {
    super();
    if (!Number.isInteger(length) || length < 1) {
      throw new Error("length must be a positive integer");
    }
    if (!Number.isInteger(bits) || bits < 1 || bits > 32) {
      throw new Error("bits must be an integer in [1, 32]");
    }
    this.length = length;
    this.outputLen = length;
    this.bits = bits;
  }

  encodeMeasurement(measurement: number[]): bigint[] {
    if (measurement.length !== this.length) {
      throw new Error(
        `expected a measurement of length ${this.length} but got ${measurement.length}`,
      );
    }
    return measurement.map((value) => inRange(value, this.bits));
  }

  decodeResult(output: bigint[], _measurementCount: number): number[] {
    return output.map(Number);
  }
}

function inRange(value: number | bigint, bits: number): bigint {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new Error(`measurement ${value} is not an integer`);
  }
  const big = BigInt(value);
  if (big < 0n || big >= 2n ** BigInt(bits)) {
    throw new Error(`measurement ${value} does not fit in ${bits} bits`);
  }
  return big;
}
