import assert from "assert";
import { Buffer } from "buffer";
import { TaskId, BatchId, AggregationJobId, CollectionJobId } from "./id.js";

describe("DAP TaskId", () => {
  it("requires exactly 32 bytes", () => {
    assert.throws(() => new TaskId(Buffer.from("hello")));
    assert.throws(() => new TaskId(Buffer.alloc(31)));
    assert.throws(() => new TaskId(Buffer.alloc(33)));
    assert.doesNotThrow(() => new TaskId(Buffer.alloc(32)));
  });

  it("generates a random TaskId", () => {
    const id = TaskId.random();
    const otherTaskId = TaskId.random();
    assert.notEqual(id.toString(), otherTaskId.toString());
  });

  it("stringifies as the base64url representation", () => {
    const id = new TaskId(
      Buffer.from(
        "dd74c11f14ed500b48e75e8679766c5482a304f61534862617de2f1016f88dc6",
        "hex",
      ),
    );
    assert.equal(id.toString(), "3XTBHxTtUAtI516GeXZsVIKjBPYVNIYmF94vEBb4jcY");
  });

  it("can be built from its base64url representation", () => {
    const id = new TaskId("3XTBHxTtUAtI516GeXZsVIKjBPYVNIYmF94vEBb4jcY");
    assert.equal(
      id.buffer.toString("hex"),
      "dd74c11f14ed500b48e75e8679766c5482a304f61534862617de2f1016f88dc6",
    );
  });

  it("parses exactly 32 bytes from a longer buffer", () => {
    const bytes = Buffer.concat([Buffer.alloc(32, 7), Buffer.from([1])]);
    assert.deepEqual(TaskId.parse(bytes).buffer, Buffer.alloc(32, 7));
  });
});

describe("DAP identifiers", () => {
  it("compares by value", () => {
    const id = new BatchId(Buffer.alloc(32, 1));
    assert(id.equals(new BatchId(Buffer.alloc(32, 1))));
    assert(!id.equals(new BatchId(Buffer.alloc(32, 2))));
  });

  it("names the identifier type in length errors", () => {
    assert.throws(
      () => new AggregationJobId(Buffer.alloc(3)),
      /expected AggregationJobId to be 32 bytes long/,
    );
    assert.throws(
      () => new CollectionJobId("AAAA"),
      /expected CollectionJobId to be 32 bytes long/,
    );
  });
});
