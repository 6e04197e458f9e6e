import type { Buffer } from "buffer";
import type { TaskId } from "@tally/dap";
import type { BearerToken } from "./auth.js";

/**
   An inbound protocol request with the transport stripped away.
*/
export interface DapRequest {
  /** protocol version tag, such as `dap-02` */
  version: string;
  mediaType?: string;
  taskId?: TaskId;
  payload: Buffer;
  url: URL;
  senderAuth?: BearerToken;
}

export interface DapResponse {
  mediaType: string;
  payload: Buffer;
}

/** How a Leader reaches its Helper. */
export interface HelperClient {
  aggregate(request: DapRequest): Promise<DapResponse>;
  aggregateShare(request: DapRequest): Promise<DapResponse>;
}
