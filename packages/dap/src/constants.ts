/**
   The protocol version for this DAP implementation. Usually of the
   form `dap-{nn}`.
*/
export const DAP_VERSION = Object.freeze("dap-02");

export const SUPPORTED_VERSIONS: readonly string[] = Object.freeze([
  DAP_VERSION,
]);

export const MEDIA_TYPES = Object.freeze({
  REPORT: "application/dap-report",
  HPKE_CONFIG: "application/dap-hpke-config",
  AGGREGATE_INITIALIZE_REQ: "application/dap-aggregate-initialize-req",
  AGGREGATE_CONTINUE_REQ: "application/dap-aggregate-continue-req",
  AGGREGATE_RESP: "application/dap-aggregate-resp",
  AGGREGATE_SHARE_REQ: "application/dap-aggregate-share-req",
  AGGREGATE_SHARE_RESP: "application/dap-aggregate-share-resp",
  COLLECT_REQ: "application/dap-collect-req",
  COLLECT_RESP: "application/dap-collect-resp",
});

export enum Role {
  Collector = 0,
  Client = 1,
  Leader = 2,
  Helper = 3,
}
