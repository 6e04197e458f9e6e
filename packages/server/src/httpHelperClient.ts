import { Buffer } from "buffer";
import type { DapRequest, DapResponse, HelperClient } from "@tally/aggregator";
import { DAPError } from "@tally/dap";

export const AUTH_HEADER = "DAP-Auth-Token";

type Fetch = (
  input: RequestInfo,
  init?: RequestInit | undefined,
) => Promise<Response>;

/**
   Reaches a Helper over HTTP. Problem documents in the Helper's
   responses are rethrown as {@linkcode DAPError}.
*/
export class HttpHelperClient implements HelperClient {
  #fetch: Fetch;

  constructor(fetch: Fetch = globalThis.fetch.bind(globalThis)) {
    this.#fetch = fetch;
  }

  aggregate(request: DapRequest): Promise<DapResponse> {
    return this.post(request, "aggregate request failed");
  }

  aggregateShare(request: DapRequest): Promise<DapResponse> {
    return this.post(request, "aggregate share request failed");
  }

  private async post(
    request: DapRequest,
    description: string,
  ): Promise<DapResponse> {
    const headers: Record<string, string> = {};
    if (request.mediaType) headers["Content-Type"] = request.mediaType;
    if (request.senderAuth) headers[AUTH_HEADER] = request.senderAuth;

    const response = await this.#fetch(request.url.toString(), {
      method: "POST",
      headers,
      body: new Uint8Array(request.payload),
    });

    if (!response.ok) {
      throw await DAPError.fromResponse(response, description);
    }

    return {
      mediaType: response.headers.get("Content-Type") ?? "",
      payload: Buffer.from(await response.arrayBuffer()),
    };
  }
}
