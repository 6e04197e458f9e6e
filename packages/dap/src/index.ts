export { Client } from "./client.js";
export type { ClientParameters, ReportOptions } from "./client.js";
export { Aggregator } from "./aggregator.js";
export {
  DAP_VERSION,
  SUPPORTED_VERSIONS,
  MEDIA_TYPES,
  Role,
} from "./constants.js";
export {
  DAPError,
  DapAbort,
  PROBLEM_TYPE_PREFIX,
} from "./errors.js";
export type { AbortKind, Problem } from "./errors.js";
export {
  Parser,
  encodeArray16,
  encodeArray32,
  encodeOpaque8,
  encodeOpaque16,
  encodeOpaque32,
  encodeUint8,
  encodeUint16,
  encodeUint32,
  encodeUint64,
} from "./encoding.js";
export type { Encodable, ParseSource } from "./encoding.js";
export {
  Id,
  TaskId,
  BatchId,
  AggregationJobId,
  CollectionJobId,
} from "./id.js";
export { ReportId } from "./reportId.js";
export { Extension, ExtensionType } from "./extension.js";
export { HpkeCiphertext } from "./ciphertext.js";
export {
  HpkeConfig,
  HpkeReceiverConfig,
  HpkeError,
  openWithAny,
} from "./hpkeConfig.js";
export type { HpkeErrorKind } from "./hpkeConfig.js";
export {
  Report,
  ReportMetadata,
  ReportShare,
  InputShareAad,
  InputShareInfo,
  AggregateShareAad,
  AggregateShareInfo,
} from "./report.js";
export {
  QueryType,
  Interval,
  TimeIntervalQuery,
  FixedSizeQuery,
  Query,
  BatchSelector,
  TimeIntervalPartialSelector,
  FixedSizePartialSelector,
  PartialBatchSelector,
} from "./query.js";
export {
  Transition,
  TransitionType,
  TransitionFailure,
  AggregateInitializeReq,
  AggregateContinueReq,
  AggregateResp,
  AggregateShareReq,
  AggregateShareResp,
} from "./aggregate.js";
export type { TransitionVar } from "./aggregate.js";
export { CollectReq, CollectResp } from "./collect.js";
export {
  TaskprovConfig,
  TaskprovQueryConfig,
  TaskprovVdafConfig,
  UrlBytes,
  VdafType,
  computeTaskId,
} from "./taskprov.js";
export type { VdafConfig, QueryMode } from "./taskprov.js";
