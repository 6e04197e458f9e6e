import {
  integerToOctetStringLE,
  octetStringToIntegerLE,
  arr,
  concat,
  randomBytes,
} from "@tally/common";

export class Field {
  readonly modulus: bigint;
  readonly encodedSize: number;

  constructor({ modulus, encodedSize }: FieldConstructorArgs) {
    this.modulus = modulus;
    this.encodedSize = encodedSize;
  }

  add(a: bigint, b: bigint): bigint {
    return (a + b) % this.modulus;
  }

  sub(a: bigint, b: bigint): bigint {
    return (this.modulus + a - b) % this.modulus;
  }

  mul(a: bigint, b: bigint): bigint {
    return (a * b) % this.modulus;
  }

  vecAdd(a: bigint[], b: bigint[]): bigint[] {
    if (a.length !== b.length) {
      throw new Error("cannot add vectors of unequal length");
    }
    return a.map((x, i) => this.add(x, b[i]));
  }

  vecSub(a: bigint[], b: bigint[]): bigint[] {
    if (a.length !== b.length) {
      throw new Error("cannot subtract vectors of unequal length");
    }
    return a.map((x, i) => this.sub(x, b[i]));
  }

  sum<T>(arr: T[], mapper: (value: T, index: number) => bigint): bigint {
    return arr.reduce(
      (sum, value, index) => this.add(sum, mapper(value, index)),
      0n,
    );
  }

  randomElement(): bigint {
    for (;;) {
      const candidate = octetStringToIntegerLE(randomBytes(this.encodedSize));
      if (candidate < this.modulus) return candidate;
    }
  }

  fillRandom(length: number): bigint[] {
    return arr(length, () => this.randomElement());
  }

  encode(data: bigint[]): Uint8Array {
    return concat(data.map((x) => integerToOctetStringLE(x, this.encodedSize)));
  }

  decode(encoded: Uint8Array): bigint[] {
    const encodedSize = this.encodedSize;
    if (encoded.length % encodedSize !== 0) {
      throw new Error(
        `could not decode, expected ${encoded.length} to be a multiple of ${encodedSize}`,
      );
    }

    return arr(encoded.length / encodedSize, (index) => {
      const n = octetStringToIntegerLE(
        encoded.slice(index * encodedSize, (index + 1) * encodedSize),
      );
      if (n >= this.modulus) {
        throw new Error("decoded an element that is not in the field");
      }
      return n;
    });
  }

  additiveSecretShare(input: bigint[], numShares: number): bigint[][] {
    const shares = arr(numShares - 1, () => this.fillRandom(input.length));
    return [
      ...shares,
      shares.reduce((last, share) => this.vecSub(last, share), input),
    ];
  }
}

interface FieldConstructorArgs {
  modulus: bigint;
  encodedSize: number;
}

export class Field64 extends Field {
  constructor() {
    super({
      modulus: 2n ** 32n * 4294967295n + 1n,
      encodedSize: 8,
    });
  }
}
