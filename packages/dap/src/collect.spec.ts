import assert from "assert";
import { Buffer } from "buffer";
import { TaskId } from "./id.js";
import { HpkeCiphertext } from "./ciphertext.js";
import {
  Interval,
  TimeIntervalPartialSelector,
  TimeIntervalQuery,
} from "./query.js";
import { CollectReq, CollectResp } from "./collect.js";

describe("DAP CollectReq", () => {
  it("defaults to an empty aggregation parameter", () => {
    const taskId = TaskId.random();
    const req = new CollectReq(
      taskId,
      new TimeIntervalQuery(new Interval(3600, 3600)),
    );
    assert.deepEqual(
      req.encode(),
      Buffer.concat([taskId.encode(), req.query.encode(), Buffer.from([0, 0])]),
    );
    assert.deepEqual(CollectReq.parse(req.encode()), req);
  });
});

describe("DAP CollectResp", () => {
  it("round trips", () => {
    const resp = new CollectResp(new TimeIntervalPartialSelector(), 2, [
      new HpkeCiphertext(1, Buffer.from("a"), Buffer.from("leader")),
      new HpkeCiphertext(2, Buffer.from("b"), Buffer.from("helper")),
    ]);
    assert.deepEqual(CollectResp.parse(resp.encode()), resp);
  });
});
