import type { Helper } from "./helper.js";
import type { DapRequest, DapResponse, HelperClient } from "./request.js";

/** Reaches a Helper running in the same process. */
export class LocalHelperClient implements HelperClient {
  constructor(private readonly helper: Helper) {}

  aggregate(request: DapRequest): Promise<DapResponse> {
    return this.helper.handleAggregate(request);
  }

  aggregateShare(request: DapRequest): Promise<DapResponse> {
    return this.helper.handleAggregateShare(request);
  }
}
