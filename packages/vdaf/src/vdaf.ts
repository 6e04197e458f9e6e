import { Buffer } from "buffer";
import { arr, fill, randomBytes } from "@tally/common";
import type { Field } from "./field.js";

export type OutputShare = bigint[];
export type AggregatorShare = bigint[];

/**
   Raised by a {@linkcode Vdaf} when a share, preparation message or
   aggregation parameter fails to decode or verify. Aggregators report
   this per report rather than aborting the request.
*/
export class VdafError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VdafError";
  }
}

/**
   The aggregation capability the aggregators drive. Every value that
   crosses the aggregator boundary is already encoded, so preparation
   state can be stored between requests without knowing its shape.

   Only single-round schemes with two aggregators are modelled.
*/
export abstract class Vdaf<Measurement, AggregateResult> {
  abstract readonly id: number;
  abstract readonly verifyKeySize: number;
  abstract readonly field: Field;
  /** length of output shares and aggregator shares */
  abstract readonly outputLen: number;
  readonly shares = 2;
  readonly rounds = 1;
  readonly nonceSize = 16;

  abstract shard(
    measurement: Measurement,
    nonce: Buffer,
  ): Promise<{ publicShare: Buffer; inputShares: Buffer[] }>;

  abstract prepareInit(
    verifyKey: Buffer,
    aggregatorId: number,
    aggregationParameter: Buffer,
    nonce: Buffer,
    publicShare: Buffer,
    inputShare: Buffer,
  ): Promise<{ preparationState: Buffer; preparationShare: Buffer }>;

  abstract unshardPreparationShares(
    aggregationParameter: Buffer,
    preparationShares: Buffer[],
  ): Buffer;

  abstract prepareNext(
    preparationState: Buffer,
    preparationMessage: Buffer,
  ): OutputShare;

  abstract unshard(
    aggregatorShares: AggregatorShare[],
    measurementCount: number,
  ): AggregateResult;

  aggregate(outputShares: OutputShare[]): AggregatorShare {
    return outputShares.reduce(
      (agg, share) => this.field.vecAdd(agg, share),
      fill(this.outputLen, 0n),
    );
  }

  encodeAggregatorShare(aggregatorShare: AggregatorShare): Buffer {
    return Buffer.from(this.field.encode(aggregatorShare));
  }

  decodeAggregatorShare(encoded: Buffer): AggregatorShare {
    return this.decodeExact(encoded, this.outputLen);
  }

  protected decodeExact(encoded: Buffer, length: number): bigint[] {
    let decoded: bigint[];
    try {
      decoded = this.field.decode(encoded);
    } catch (error) {
      throw new VdafError(String(error));
    }
    if (decoded.length !== length) {
      throw new VdafError(
        `expected ${length} field elements but found ${decoded.length}`,
      );
    }
    return decoded;
  }

  /**
     Runs every step of the scheme in process, as both aggregators.
     Useful for checking an instantiation against a known answer.
  */
  async run({
    measurements,
    verifyKey = Buffer.from(randomBytes(this.verifyKeySize)),
    aggregationParameter = Buffer.alloc(0),
  }: {
    measurements: Measurement[];
    verifyKey?: Buffer;
    aggregationParameter?: Buffer;
  }): Promise<AggregateResult> {
    const outputShares = await Promise.all(
      measurements.map(async (measurement) => {
        const nonce = Buffer.from(randomBytes(this.nonceSize));
        const { publicShare, inputShares } = await this.shard(
          measurement,
          nonce,
        );
        const prepared = await Promise.all(
          inputShares.map((inputShare, aggregatorId) =>
            this.prepareInit(
              verifyKey,
              aggregatorId,
              aggregationParameter,
              nonce,
              publicShare,
              inputShare,
            ),
          ),
        );
        const preparationMessage = this.unshardPreparationShares(
          aggregationParameter,
          prepared.map(({ preparationShare }) => preparationShare),
        );
        return prepared.map(({ preparationState }) =>
          this.prepareNext(preparationState, preparationMessage),
        );
      }),
    );

    const aggregatorShares = arr(this.shares, (aggregatorId) =>
      this.aggregate(outputShares.map((shares) => shares[aggregatorId])),
    );

    return this.unshard(aggregatorShares, measurements.length);
  }
}
