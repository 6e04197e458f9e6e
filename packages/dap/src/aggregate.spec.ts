import assert from "assert";
import { Buffer } from "buffer";
import { AggregationJobId, BatchId, TaskId } from "./id.js";
import { ReportId } from "./reportId.js";
import { ReportMetadata, ReportShare } from "./report.js";
import { HpkeCiphertext } from "./ciphertext.js";
import {
  FixedSizePartialSelector,
  FixedSizeQuery,
  Interval,
  TimeIntervalQuery,
} from "./query.js";
import {
  AggregateContinueReq,
  AggregateInitializeReq,
  AggregateResp,
  AggregateShareReq,
  AggregateShareResp,
  Transition,
  TransitionFailure,
  TransitionType,
} from "./aggregate.js";

describe("DAP Transition", () => {
  const reportId = new ReportId(Buffer.alloc(16, 1));

  it("encodes a continued transition with its payload", () => {
    assert.deepEqual(
      Transition.continued(reportId, Buffer.from([7, 8])).encode(),
      Buffer.from([...reportId.encode(), 0, ...[0, 0, 0, 2], 7, 8]),
    );
  });

  it("encodes a finished transition as its type alone", () => {
    assert.deepEqual(
      Transition.finished(reportId).encode(),
      Buffer.from([...reportId.encode(), 1]),
    );
  });

  it("encodes a failed transition with its failure", () => {
    assert.deepEqual(
      Transition.failed(reportId, TransitionFailure.ReportReplayed).encode(),
      Buffer.from([...reportId.encode(), 2, 1]),
    );
  });

  it("decodes each variant", () => {
    const transitions = [
      Transition.continued(reportId, Buffer.from("prep")),
      Transition.finished(reportId),
      Transition.failed(reportId, TransitionFailure.TaskExpired),
    ];
    const resp = AggregateResp.parse(new AggregateResp(transitions).encode());
    assert.deepEqual(
      resp.transitions.map(({ variant }) => variant.type),
      [
        TransitionType.Continued,
        TransitionType.Finished,
        TransitionType.Failed,
      ],
    );
    assert.deepEqual(resp.transitions, transitions);
  });

  it("rejects an unknown failure", () => {
    assert.throws(
      () => Transition.parse(Buffer.from([...reportId.encode(), 2, 99])),
      /unknown transition failure 99/,
    );
  });
});

describe("DAP aggregation requests", () => {
  it("round trips an initialize request", () => {
    const req = new AggregateInitializeReq(
      TaskId.random(),
      AggregationJobId.random(),
      Buffer.alloc(0),
      new FixedSizePartialSelector(BatchId.random()),
      [
        new ReportShare(
          new ReportMetadata(ReportId.random(), 3600),
          Buffer.from("public"),
          new HpkeCiphertext(1, Buffer.from("enc"), Buffer.from("payload")),
        ),
      ],
    );
    assert.deepEqual(AggregateInitializeReq.parse(req.encode()), req);
  });

  it("round trips a continue request", () => {
    const req = new AggregateContinueReq(
      TaskId.random(),
      AggregationJobId.random(),
      [Transition.continued(ReportId.random(), Buffer.from([0]))],
    );
    assert.deepEqual(AggregateContinueReq.parse(req.encode()), req);
  });
});

describe("DAP AggregateShareReq", () => {
  it("requires a 32 byte checksum", () => {
    assert.throws(
      () =>
        new AggregateShareReq(
          TaskId.random(),
          new FixedSizeQuery(BatchId.random()),
          Buffer.alloc(0),
          0,
          Buffer.alloc(31),
        ),
      /checksum must be 32 bytes/,
    );
  });

  it("round trips", () => {
    const req = new AggregateShareReq(
      TaskId.random(),
      new TimeIntervalQuery(new Interval(3600, 3600)),
      Buffer.alloc(0),
      12,
      Buffer.alloc(32, 5),
    );
    assert.deepEqual(AggregateShareReq.parse(req.encode()), req);
  });

  it("has a response carrying a single ciphertext", () => {
    const ciphertext = new HpkeCiphertext(
      4,
      Buffer.from("enc"),
      Buffer.from("share"),
    );
    assert.deepEqual(
      new AggregateShareResp(ciphertext).encode(),
      ciphertext.encode(),
    );
  });
});
