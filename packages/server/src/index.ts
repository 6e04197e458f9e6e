export { app, toDapRequest, versionFromPath } from "./app.js";
export { buildRole, runJobs, startJobs } from "./deployment.js";
export type { JobCounts } from "./deployment.js";
export { AUTH_HEADER, HttpHelperClient } from "./httpHelperClient.js";
