import { Aggregator } from "./aggregator.js";
import assert from "assert";
import { Buffer } from "buffer";
import { Role } from "./constants.js";
import { HpkeConfig, HpkeReceiverConfig } from "./hpkeConfig.js";
import { InputShareAad, InputShareInfo, ReportMetadata } from "./report.js";
import { TaskId } from "./id.js";
import { ReportId } from "./reportId.js";
import { KdfId, AeadId } from "hpke-js";
import { DhkemP256HkdfSha256 } from "@hpke/core";

describe("DAP Aggregator", () => {
  it("should append a trailing slash on construction from a string", () => {
    const aggregator = new Aggregator(
      "http://example.com/aggregator",
      Role.Leader,
    );

    assert.equal(aggregator.url.toString(), "http://example.com/aggregator/");
  });

  it("should append a trailing slash on construction from a URL", () => {
    const aggregator = new Aggregator(
      new URL("http://example.com/aggregator"),
      Role.Leader,
    );

    assert.equal(aggregator.url.toString(), "http://example.com/aggregator/");
  });

  it("has a convenience method to build helper aggregator", () => {
    assert.deepEqual(
      Aggregator.helper("http://example.com"),
      new Aggregator("http://example.com", Role.Helper),
    );
  });

  it("has a convenience method to build leader aggregator", () => {
    assert.deepEqual(
      Aggregator.leader("http://example.com"),
      new Aggregator("http://example.com", Role.Leader),
    );
  });

  it("refuses to seal before it has an hpke config", async () => {
    const aggregator = Aggregator.helper("https://example.com");
    const aad = new InputShareAad(
      TaskId.random(),
      new ReportMetadata(ReportId.random(), 0),
      Buffer.alloc(0),
    );
    await assert.rejects(aggregator.seal(Buffer.from("payload"), aad));
  });

  it("seals input shares to its role", async () => {
    const kem = new DhkemP256HkdfSha256();
    const { publicKey, privateKey } = await kem.generateKeyPair();
    const key = await kem.serializePublicKey(publicKey);

    const hpkeConfig = new HpkeConfig(
      1,
      kem.id,
      KdfId.HkdfSha256,
      AeadId.Aes128Gcm,
      Buffer.from(key),
    );
    const aggregator = Aggregator.leader("https://example.com", hpkeConfig);

    const aad = new InputShareAad(
      TaskId.random(),
      new ReportMetadata(ReportId.random(), 1_700_000_000),
      Buffer.alloc(0),
    );
    const ciphertext = await aggregator.seal(Buffer.from("payload"), aad);
    assert.equal(ciphertext.configId, 1);

    const receiver = new HpkeReceiverConfig(hpkeConfig, privateKey);
    const opened = await receiver.open(
      ciphertext,
      new InputShareInfo(Role.Leader).encode(),
      aad.encode(),
    );
    assert.equal(opened.toString(), "payload");

    await assert.rejects(
      receiver.open(
        ciphertext,
        new InputShareInfo(Role.Helper).encode(),
        aad.encode(),
      ),
      (error: Error) => error.name === "HpkeError",
    );
  });
});
