import { DAPError, DapAbort } from "./errors.js";
import { TaskId } from "./id.js";
import assert from "assert";
import { Buffer } from "buffer";

describe("DAPError", () => {
  const sampleProblem = {
    type: "urn:ietf:params:ppm:dap:error:unrecognizedTask",
    title: "An endpoint received a message with an unknown task ID.",
    detail: "no task with that id",
    status: 404,
    instance: "..",
    taskid: "3XTBHxTtUAtI516GeXZsVIKjBPYVNIYmF94vEBb4jcY",
  };

  context("fromResponse", () => {
    it("can be constructed from a problem json response", async () => {
      const error = await DAPError.fromResponse(
        new Response(JSON.stringify(sampleProblem), {
          headers: { "Content-Type": "application/problem+json" },
        }),
        "client context",
      );

      assert(error instanceof DAPError);
      assert.equal(error.type, sampleProblem.type);
      assert.equal(error.clientContext, "client context");
      assert.equal(error.title, sampleProblem.title);
      assert.equal(error.shortType, "unrecognizedTask");
      assert.equal(error.detail, sampleProblem.detail);
      assert.equal(
        error.message,
        "unrecognizedTask: An endpoint received a message with an unknown task ID.",
      );
      assert.equal(error.status, 404);
      assert.equal(error.instance, "..");
      assert.equal(error.taskId?.toString(), sampleProblem.taskid);
    });

    it("returns a normal Error with the client context when the response isn't problem json", async () => {
      const error = await DAPError.fromResponse(
        new Response("doesn't matter", { status: 500 }),
        "client context",
      );

      assert(!(error instanceof DAPError));
      assert.equal(error.message, "client context (status 500)");
    });

    it("does not trust a problem json body without the required members", async () => {
      const error = await DAPError.fromResponse(
        new Response(JSON.stringify({ type: "x" }), {
          status: 400,
          headers: { "Content-Type": "application/problem+json" },
        }),
        "client context",
      );
      assert(!(error instanceof DAPError));
    });
  });
});

describe("DapAbort", () => {
  const taskId = new TaskId(Buffer.alloc(32));

  it("renders a problem document", () => {
    const abort = new DapAbort("batchOverlap", undefined, taskId);
    assert.deepEqual(abort.toProblem(), {
      type: "urn:ietf:params:ppm:dap:error:batchOverlap",
      title: "The queried batch overlaps with a previously queried batch.",
      status: 400,
      taskid: "AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA",
    });
  });

  it("maps authorization and lookup failures to their own statuses", () => {
    assert.equal(new DapAbort("unauthorizedRequest").status, 401);
    assert.equal(new DapAbort("unrecognizedTask").status, 404);
    assert.equal(new DapAbort("unrecognizedAggregationJob").status, 404);
    assert.equal(new DapAbort("queryMismatch").status, 400);
  });

  it("carries the bad request reason as detail", () => {
    const abort = DapAbort.badRequest("batch interval too large");
    assert.equal(abort.kind, "badRequest");
    assert.equal(abort.detail, "batch interval too large");
    assert.equal(abort.message, "badRequest: batch interval too large");
    assert.equal(abort.toProblem().detail, "batch interval too large");
  });

  it("round trips through DAPError on the requesting side", async () => {
    const abort = new DapAbort("reportTooLate", "task expired", taskId);
    const error = await DAPError.fromResponse(
      new Response(JSON.stringify(abort.toProblem()), {
        status: abort.status,
        headers: { "Content-Type": "application/problem+json" },
      }),
      "upload",
    );
    assert(error instanceof DAPError);
    assert.equal(error.shortType, "reportTooLate");
    assert.equal(error.detail, "task expired");
    assert(error.taskId?.equals(taskId));
  });
});
