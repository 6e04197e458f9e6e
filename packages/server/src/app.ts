import { Buffer } from "buffer";
import type { Request, Response } from "express";
import express from "express";
import {
  Leader,
  createLogger,
  type DapRequest,
  type DapResponse,
  type Helper,
  type Logger,
} from "@tally/aggregator";
import { CollectionJobId, DapAbort, MEDIA_TYPES, TaskId } from "@tally/dap";
import { AUTH_HEADER } from "./httpHelperClient.js";

const TASK_ID_LENGTH = 32;

/** `v02` in a route is protocol version `dap-02`. */
export function versionFromPath(segment: string): string {
  const match = /^v(\d+)$/.exec(segment);
  return match ? `dap-${match[1]}` : segment;
}

function payloadOf(req: Request): Buffer {
  const body: unknown = req.body;
  return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
}

// every request body of this protocol version starts with its task ID
function leadingTaskId(payload: Buffer): TaskId | undefined {
  if (payload.length < TASK_ID_LENGTH) return undefined;
  return new TaskId(payload.subarray(0, TASK_ID_LENGTH));
}

function parseId<T>(make: (encoded: string) => T, encoded: string): T {
  try {
    return make(encoded);
  } catch (error) {
    throw new DapAbort(
      "unrecognizedMessage",
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function toDapRequest(req: Request, taskId?: TaskId): DapRequest {
  const payload = payloadOf(req);
  const host = req.get("host") ?? "localhost";
  return {
    version: versionFromPath(req.params.version),
    mediaType: req.get("Content-Type"),
    taskId: taskId ?? leadingTaskId(payload),
    payload,
    url: new URL(req.originalUrl, `${req.protocol}://${host}`),
    senderAuth: req.get(AUTH_HEADER),
  };
}

function send(res: Response, resp: DapResponse): void {
  res.status(200).type(resp.mediaType).send(resp.payload);
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(handler: Handler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function leaderRoutes(app: express.Express, leader: Leader): void {
  app.put(
    "/:version/upload",
    route(async (req, res) => {
      await leader.upload(toDapRequest(req));
      res.sendStatus(200);
    }),
  );

  app.post(
    "/:version/collect",
    route(async (req, res) => {
      const locator = await leader.submitCollect(toDapRequest(req));
      res.redirect(303, locator.toString());
    }),
  );

  app.get(
    "/:version/collect/task/:taskId/req/:collectId",
    route(async (req, res) => {
      const taskId = parseId((id) => new TaskId(id), req.params.taskId);
      const collectId = parseId(
        (id) => new CollectionJobId(id),
        req.params.collectId,
      );
      const job = await leader.collectJobStatus(
        toDapRequest(req, taskId),
        collectId,
      );

      switch (job.status) {
        case "done":
          send(res, {
            mediaType: MEDIA_TYPES.COLLECT_RESP,
            payload: job.response.encode(),
          });
          break;
        case "pending":
          res.sendStatus(202);
          break;
        case "unknown":
          res.sendStatus(404);
          break;
      }
    }),
  );
}

function helperRoutes(app: express.Express, helper: Helper): void {
  app.post(
    "/:version/aggregate",
    route(async (req, res) => {
      send(res, await helper.handleAggregate(toDapRequest(req)));
    }),
  );

  app.post(
    "/:version/aggregate_share",
    route(async (req, res) => {
      send(res, await helper.handleAggregateShare(toDapRequest(req)));
    }),
  );
}

function errorHandler(logger: Logger): express.ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (error instanceof DapAbort) {
      logger.warn(`${req.method} ${req.path} aborted: ${error.message}`);
      // a Buffer body keeps express from appending a charset
      res
        .status(error.status)
        .type("application/problem+json")
        .send(Buffer.from(JSON.stringify(error.toProblem())));
      return;
    }

    // body-parser rejections such as an oversized payload
    if (
      error instanceof Error &&
      "status" in error &&
      typeof error.status === "number" &&
      error.status < 500
    ) {
      res.sendStatus(error.status);
      return;
    }

    logger.error(`${req.method} ${req.path} failed`, error);
    res.sendStatus(500);
  };
}

/**
   The HTTP surface of one aggregator. A Leader serves uploads and
   collection; a Helper serves the aggregation endpoints. Both serve
   `hpke_config`.
*/
export function app(
  role: Leader | Helper,
  logger: Logger = createLogger("tally:http"),
): express.Express {
  const app = express();
  app.use(express.raw({ type: () => true, limit: "10mb" }));

  app.get(
    "/:version/hpke_config",
    route(async (req, res) => {
      send(res, await role.hpkeConfig(toDapRequest(req)));
    }),
  );

  if (role instanceof Leader) {
    leaderRoutes(app, role);
  } else {
    helperRoutes(app, role);
  }

  app.use(errorHandler(logger));
  return app;
}
