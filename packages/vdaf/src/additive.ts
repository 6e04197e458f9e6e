import { Buffer } from "buffer";
import { sha256, octetStringToIntegerLE } from "@tally/common";
import { Vdaf, VdafError } from "./vdaf.js";
import type { OutputShare, AggregatorShare } from "./vdaf.js";
import { Field64 } from "./field.js";

/**
   A single-round scheme over {@linkcode Field64} that additively shares
   the encoded measurement `m` together with `c = k·m`, where `k` is a
   nonzero coefficient the client publishes in the public share.

   Each aggregator contributes `Σ r_j (c_j − k·m_j)` as its preparation
   share, with `r` derived from the verify key and the report nonce.
   Honest shares sum to zero; a share altered in transit does not.

   This checks share integrity only. It is not a validity proof, so a
   client can still submit an out-of-range measurement.
*/
export abstract class AdditiveVdaf<Measurement, AggregateResult> extends Vdaf<
  Measurement,
  AggregateResult
> {
  readonly field = new Field64();
  readonly verifyKeySize = 16;

  abstract encodeMeasurement(measurement: Measurement): bigint[];
  abstract decodeResult(
    output: bigint[],
    measurementCount: number,
  ): AggregateResult;

  async shard(
    measurement: Measurement,
    nonce: Buffer,
  ): Promise<{ publicShare: Buffer; inputShares: Buffer[] }> {
    const { field } = this;
    if (nonce.length !== this.nonceSize) {
      throw new Error(`nonce must be ${this.nonceSize} bytes`);
    }

    const encoded = this.encodeMeasurement(measurement);
    let coefficient = 0n;
    while (coefficient === 0n) coefficient = field.randomElement();
    const checked = encoded.map((x) => field.mul(coefficient, x));

    const measurementShares = field.additiveSecretShare(encoded, this.shares);
    const checkShares = field.additiveSecretShare(checked, this.shares);

    return {
      publicShare: Buffer.from(field.encode([coefficient])),
      inputShares: measurementShares.map((share, i) =>
        Buffer.from(field.encode([...share, ...checkShares[i]])),
      ),
    };
  }

  async prepareInit(
    verifyKey: Buffer,
    aggregatorId: number,
    aggregationParameter: Buffer,
    nonce: Buffer,
    publicShare: Buffer,
    inputShare: Buffer,
  ): Promise<{ preparationState: Buffer; preparationShare: Buffer }> {
    const { field, outputLen } = this;
    if (aggregationParameter.length !== 0) {
      throw new VdafError("unexpected aggregation parameter");
    }
    if (verifyKey.length !== this.verifyKeySize) {
      throw new VdafError(`verify key must be ${this.verifyKeySize} bytes`);
    }
    if (aggregatorId < 0 || aggregatorId >= this.shares) {
      throw new VdafError(`no aggregator with id ${aggregatorId}`);
    }

    const [coefficient] = this.decodeExact(publicShare, 1);
    if (coefficient === 0n) {
      throw new VdafError("public share coefficient must be nonzero");
    }

    const values = this.decodeExact(inputShare, 2 * outputLen);
    const measurementShare = values.slice(0, outputLen);
    const checkShare = values.slice(outputLen);
    const queryRand = await this.queryRand(verifyKey, nonce);

    const verifierShare = field.sum(measurementShare, (m, j) =>
      field.mul(
        queryRand[j],
        field.sub(checkShare[j], field.mul(coefficient, m)),
      ),
    );

    return {
      preparationState: Buffer.from(field.encode(measurementShare)),
      preparationShare: Buffer.from(field.encode([verifierShare])),
    };
  }

  unshardPreparationShares(
    aggregationParameter: Buffer,
    preparationShares: Buffer[],
  ): Buffer {
    if (aggregationParameter.length !== 0) {
      throw new VdafError("unexpected aggregation parameter");
    }
    if (preparationShares.length !== this.shares) {
      throw new VdafError(
        `expected ${this.shares} preparation shares but found ${preparationShares.length}`,
      );
    }

    const verifier = this.field.sum(
      preparationShares,
      (share) => this.decodeExact(share, 1)[0],
    );
    if (verifier !== 0n) {
      throw new VdafError("verify error");
    }

    return Buffer.from(this.field.encode([verifier]));
  }

  prepareNext(
    preparationState: Buffer,
    preparationMessage: Buffer,
  ): OutputShare {
    const [verifier] = this.decodeExact(preparationMessage, 1);
    if (verifier !== 0n) {
      throw new VdafError("verify error");
    }
    return this.decodeExact(preparationState, this.outputLen);
  }

  unshard(
    aggregatorShares: AggregatorShare[],
    measurementCount: number,
  ): AggregateResult {
    return this.decodeResult(
      this.aggregate(aggregatorShares),
      measurementCount,
    );
  }

  private async queryRand(verifyKey: Buffer, nonce: Buffer): Promise<bigint[]> {
    const rand: bigint[] = [];
    for (let j = 0; j < this.outputLen; j++) {
      const counter = Buffer.alloc(4);
      counter.writeUInt32BE(j, 0);
      const digest = await sha256(Buffer.concat([verifyKey, nonce, counter]));
      rand.push(
        octetStringToIntegerLE(digest.slice(0, 8)) % this.field.modulus,
      );
    }
    return rand;
  }
}
