export { Vdaf, VdafError } from "./vdaf.js";
export type { OutputShare, AggregatorShare } from "./vdaf.js";
export { Field, Field64 } from "./field.js";
export { AdditiveVdaf } from "./additive.js";
export { Count, Sum, SumVec } from "./instantiations.js";
