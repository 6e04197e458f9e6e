import { ReportId } from "./reportId.js";
import assert from "assert";
import { Buffer } from "buffer";

describe("DAP ReportID", () => {
  describe("random", () => {
    it("generates a random ReportID", () => {
      const reportId = ReportId.random();
      assert.equal(reportId.buffer.length, 16);
    });
  });

  describe("construction", () => {
    it("throws an error if the id is not exactly 16 bytes", () => {
      assert.throws(() => new ReportId(Buffer.alloc(15)));
      assert.doesNotThrow(() => new ReportId(Buffer.alloc(16)));
      assert.throws(() => new ReportId(Buffer.alloc(17)));
    });
  });

  describe("encode", () => {
    it("writes the 16 id bytes", () => {
      const reportId = new ReportId(Buffer.alloc(16, 255));
      assert.deepEqual(reportId.encode(), Buffer.alloc(16, 255));
    });
  });

  describe("toString", () => {
    it("is base64url without padding", () => {
      assert.equal(
        new ReportId(Buffer.alloc(16, 0xfb)).toString(),
        "-_v7-_v7-_v7-_v7-_v7-w",
      );
    });
  });
});
