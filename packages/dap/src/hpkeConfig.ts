import { Buffer } from "buffer";
import { CipherSuite, KemId, KdfId, AeadId } from "hpke-js";
import { toArrayBuffer } from "@tally/common";
import { Parser, type ParseSource, type Encodable } from "./encoding.js";
import { HpkeCiphertext } from "./ciphertext.js";

export type HpkeErrorKind = "unknownConfigId" | "decryptError";

/**
   Raised when an aggregator or collector cannot open a ciphertext,
   either because it was sealed to a config it does not hold or
   because decryption failed.
*/
export class HpkeError extends Error {
  constructor(
    readonly kind: HpkeErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "HpkeError";
  }
}

function identifier<T extends number>(
  ids: { [key: string]: T },
  value: number,
): T | undefined {
  return Object.values(ids).find((id) => id === value);
}

export class HpkeConfig implements Encodable {
  constructor(
    public id: number,
    public kemId: number,
    public kdfId: number,
    public aeadId: number,
    public publicKey: Buffer,
  ) {
    if (id !== Math.floor(id) || id < 0 || id > 255) {
      throw new Error("id must be an integer in [0, 255]");
    }

    this.validate(KemId, "kemId");
    this.validate(KdfId, "kdfId");
    this.validate(AeadId, "aeadId");
  }

  private validate(
    e: { [key: string]: number },
    id: "kemId" | "kdfId" | "aeadId",
  ) {
    const actual = this[id];

    if (identifier(e, actual) === undefined) {
      const errorText = Object.entries(e)
        .map(([name, identifier]) => `    ${identifier}: ${name}`)
        .join("\n");

      throw new Error(
        `${id} was ${actual} but must be one of the following:\n${errorText}`,
      );
    }
  }

  static parse(parsable: ParseSource): HpkeConfig {
    const parser = Parser.from(parsable);
    return new HpkeConfig(
      parser.uint8(),
      parser.uint16(),
      parser.uint16(),
      parser.uint16(),
      parser.opaque16(),
    );
  }

  encode(): Buffer {
    const len = this.publicKey.length;
    const buffer = Buffer.alloc(len + 9);
    let cursor = 0;
    buffer.writeUInt8(this.id, cursor);
    buffer.writeUInt16BE(this.kemId, (cursor += 1));
    buffer.writeUInt16BE(this.kdfId, (cursor += 2));
    buffer.writeUInt16BE(this.aeadId, (cursor += 2));
    buffer.writeUInt16BE(len, (cursor += 2));
    this.publicKey.copy(buffer, cursor + 2);
    return buffer;
  }

  /** @internal */
  cipherSuite(): CipherSuite {
    const kem = identifier(KemId, this.kemId);
    const kdf = identifier(KdfId, this.kdfId);
    const aead = identifier(AeadId, this.aeadId);
    if (kem === undefined || kdf === undefined || aead === undefined) {
      throw new Error(`hpke config ${this.id} names an unknown algorithm`);
    }
    return new CipherSuite({ aead, kdf, kem });
  }

  async seal(
    info: Buffer,
    plaintext: Buffer,
    aad: Buffer,
  ): Promise<HpkeCiphertext> {
    const cipherSuite = this.cipherSuite();
    const recipientPublicKey = await cipherSuite.kem.importKey(
      "raw",
      toArrayBuffer(this.publicKey),
    );

    const { ct, enc } = await cipherSuite.seal(
      { recipientPublicKey, info: toArrayBuffer(info) },
      toArrayBuffer(plaintext),
      toArrayBuffer(aad),
    );

    return new HpkeCiphertext(this.id, Buffer.from(enc), Buffer.from(ct));
  }
}

/**
   An {@linkcode HpkeConfig} together with the private key that opens
   ciphertexts sealed to it.
*/
export class HpkeReceiverConfig {
  constructor(
    readonly config: HpkeConfig,
    private readonly recipientKey: CryptoKeyPair | CryptoKey,
  ) {}

  static async generate(
    id: number,
    kemId: number = KemId.DhkemX25519HkdfSha256,
    kdfId: number = KdfId.HkdfSha256,
    aeadId: number = AeadId.Aes128Gcm,
  ): Promise<HpkeReceiverConfig> {
    const { kem } = new HpkeConfig(
      id,
      kemId,
      kdfId,
      aeadId,
      Buffer.alloc(0),
    ).cipherSuite();
    const keyPair = await kem.generateKeyPair();
    const publicKey = Buffer.from(
      await kem.serializePublicKey(keyPair.publicKey),
    );
    return new HpkeReceiverConfig(
      new HpkeConfig(id, kemId, kdfId, aeadId, publicKey),
      keyPair,
    );
  }

  /**
     Builds a receiver config from a raw private key, as stored in a
     deployment's configuration file.
  */
  static async fromPrivateKey(
    config: HpkeConfig,
    privateKey: Buffer,
  ): Promise<HpkeReceiverConfig> {
    const { kem } = config.cipherSuite();
    const key = await kem.importKey("raw", toArrayBuffer(privateKey), false);
    return new HpkeReceiverConfig(config, key);
  }

  async open(
    ciphertext: HpkeCiphertext,
    info: Buffer,
    aad: Buffer,
  ): Promise<Buffer> {
    if (ciphertext.configId !== this.config.id) {
      throw new HpkeError(
        "unknownConfigId",
        `ciphertext was sealed to hpke config ${ciphertext.configId}, not ${this.config.id}`,
      );
    }

    try {
      const plaintext = await this.config.cipherSuite().open(
        {
          recipientKey: this.recipientKey,
          enc: toArrayBuffer(ciphertext.encapsulatedContext),
          info: toArrayBuffer(info),
        },
        toArrayBuffer(ciphertext.payload),
        toArrayBuffer(aad),
      );
      return Buffer.from(plaintext);
    } catch (error) {
      throw new HpkeError(
        "decryptError",
        `could not open ciphertext: ${String(error)}`,
      );
    }
  }
}

/**
   Opens a ciphertext with whichever of `receivers` holds its config id.
*/
export async function openWithAny(
  receivers: HpkeReceiverConfig[],
  ciphertext: HpkeCiphertext,
  info: Buffer,
  aad: Buffer,
): Promise<Buffer> {
  const receiver = receivers.find(
    ({ config }) => config.id === ciphertext.configId,
  );
  if (!receiver) {
    throw new HpkeError(
      "unknownConfigId",
      `no hpke config with id ${ciphertext.configId}`,
    );
  }
  return receiver.open(ciphertext, info, aad);
}
