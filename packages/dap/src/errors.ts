import { TaskId } from "./id.js";

export const PROBLEM_TYPE_PREFIX = "urn:ietf:params:ppm:dap:error:";

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  taskid?: string;
}

function isProblem(body: unknown): body is Problem {
  return (
    typeof body === "object" &&
    body !== null &&
    "type" in body &&
    typeof body.type === "string" &&
    "title" in body &&
    typeof body.title === "string" &&
    "status" in body &&
    typeof body.status === "number"
  );
}

/**
   An error response from a DAP server, as parsed on the requesting
   side.
*/
export class DAPError extends Error {
  readonly type: string;
  readonly title: string;
  readonly status: number;
  readonly detail?: string;
  readonly instance?: string;
  readonly clientContext: string;
  readonly taskId?: TaskId;
  readonly shortType: string;

  constructor(problem: Problem, clientContext: string) {
    const shortType = problem.type.split(":").slice(-1)[0];
    super(`${shortType}: ${problem.title}`);
    this.shortType = shortType;
    this.type = problem.type;
    this.title = problem.title;
    this.status = problem.status;
    this.detail = problem.detail;
    this.instance = problem.instance;
    this.clientContext = clientContext;
    if (problem.taskid) this.taskId = new TaskId(problem.taskid);
  }

  static async fromResponse(
    response: Response,
    description: string,
  ): Promise<DAPError | Error> {
    const contentType = response.headers.get("Content-Type");
    if (contentType && contentType.match(/^application\/problem\+json/)) {
      const body: unknown = await response.json();
      if (isProblem(body)) return new DAPError(body, description);
    }

    return new Error(`${description} (status ${response.status})`);
  }
}

export type AbortKind =
  | "unrecognizedTask"
  | "missingTaskId"
  | "unauthorizedRequest"
  | "invalidProtocolVersion"
  | "unrecognizedMessage"
  | "queryMismatch"
  | "batchInvalid"
  | "batchOverlap"
  | "batchMismatch"
  | "invalidBatchSize"
  | "unrecognizedAggregationJob"
  | "reportTooLate"
  | "badRequest";

const TITLES: Record<AbortKind, string> = {
  unrecognizedTask: "An endpoint received a message with an unknown task ID.",
  missingTaskId:
    "HPKE configuration was requested without specifying a task ID.",
  unauthorizedRequest: "The request's authorization is not valid.",
  invalidProtocolVersion: "The protocol version or media type is not valid.",
  unrecognizedMessage:
    "The message type for a response was incorrect or the payload was malformed.",
  queryMismatch:
    "Query type indicated by a message does not match the task's query type.",
  batchInvalid: "The batch implied by the query is invalid.",
  batchOverlap: "The queried batch overlaps with a previously queried batch.",
  batchMismatch: "Leader and helper disagree on reports aggregated in a batch.",
  invalidBatchSize: "The number of reports included in the batch is invalid.",
  unrecognizedAggregationJob:
    "An endpoint received a message with an unknown aggregation job ID.",
  reportTooLate: "Report could not be processed because it arrived too late.",
  badRequest: "The request could not be processed.",
};

const STATUS: Partial<Record<AbortKind, number>> = {
  unauthorizedRequest: 401,
  unrecognizedTask: 404,
  unrecognizedAggregationJob: 404,
};

/**
   A request-level failure. The whole request is rejected and no
   durable state changes.
*/
export class DapAbort extends Error {
  constructor(
    readonly kind: AbortKind,
    readonly detail?: string,
    readonly taskId?: TaskId,
  ) {
    super(detail ? `${kind}: ${detail}` : kind);
    this.name = "DapAbort";
  }

  static badRequest(reason: string, taskId?: TaskId): DapAbort {
    return new DapAbort("badRequest", reason, taskId);
  }

  get status(): number {
    return STATUS[this.kind] ?? 400;
  }

  toProblem(): Problem {
    const problem: Problem = {
      type: `${PROBLEM_TYPE_PREFIX}${this.kind}`,
      title: TITLES[this.kind],
      status: this.status,
    };
    if (this.detail) problem.detail = this.detail;
    if (this.taskId) problem.taskid = this.taskId.toString();
    return problem;
  }
}
