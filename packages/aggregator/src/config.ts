import { Buffer } from "buffer";
import { z } from "zod";
import {
  DAP_VERSION,
  HpkeConfig,
  HpkeReceiverConfig,
  SUPPORTED_VERSIONS,
  TaskId,
} from "@tally/dap";
import { TaskConfig } from "./task.js";
import type { TaskTokens } from "./auth.js";
import type { LogLevel } from "./logger.js";

const seconds = z.number().int().nonnegative();

const base64url = z
  .string()
  .regex(/^[A-Za-z0-9_-]*$/, "expected a base64url string")
  .transform((value) => Buffer.from(value, "base64url"));

export const globalConfigSchema = z.object({
  maxBatchDuration: seconds,
  minBatchIntervalStart: seconds,
  maxBatchIntervalEnd: seconds,
  supportedHpkeKems: z.array(z.number().int()).nonempty(),
  allowTaskprov: z.boolean().default(false),
  requireHpkeConfigTaskId: z.boolean().default(true),
  /** how long Done collect jobs are kept; null keeps them forever */
  collectJobRetention: seconds.nullable().default(null),
  /** how long after task expiration replay sets are kept */
  replayRetention: seconds.nullable().default(null),
});

export type GlobalConfig = z.output<typeof globalConfigSchema>;

export function parseGlobalConfig(input: unknown): GlobalConfig {
  return globalConfigSchema.parse(input);
}

export const hpkeConfigSchema = z
  .object({
    id: z.number().int(),
    kemId: z.number().int(),
    kdfId: z.number().int(),
    aeadId: z.number().int(),
    publicKey: base64url,
  })
  .transform((value, ctx) => {
    try {
      return new HpkeConfig(
        value.id,
        value.kemId,
        value.kdfId,
        value.aeadId,
        value.publicKey,
      );
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(error) });
      return z.NEVER;
    }
  });

const querySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("timeInterval") }),
  z.object({
    type: z.literal("fixedSize"),
    maxBatchSize: z.number().int().positive(),
  }),
]);

const vdafSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("count") }),
  z.object({ type: z.literal("sum"), bits: z.number().int().min(1).max(32) }),
  z.object({
    type: z.literal("sumVec"),
    length: z.number().int().positive(),
    bits: z.number().int().min(1).max(32),
  }),
]);

export const taskConfigSchema = z
  .object({
    taskId: z.string(),
    version: z
      .string()
      .default(DAP_VERSION)
      .refine((version) => SUPPORTED_VERSIONS.includes(version), {
        message: "unsupported protocol version",
      }),
    leaderUrl: z.string().url(),
    helperUrl: z.string().url(),
    collectorHpkeConfig: hpkeConfigSchema,
    timePrecision: z.number().int().positive(),
    expiration: seconds,
    minBatchSize: z.number().int().nonnegative(),
    query: querySchema,
    vdaf: vdafSchema,
    verifyKey: base64url,
  })
  .transform((value, ctx) => {
    try {
      return new TaskConfig({ ...value, taskId: new TaskId(value.taskId) });
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: String(error) });
      return z.NEVER;
    }
  });

export function parseTaskConfigs(input: unknown): TaskConfig[] {
  return z.array(taskConfigSchema).parse(input);
}

const tokensSchema = z.object({
  leader: z.string().min(1).optional(),
  collector: z.string().min(1).optional(),
});

export const deploymentConfigSchema = z.object({
  role: z.enum(["leader", "helper"]),
  port: z.number().int().min(0).max(65535).default(8788),
  logLevel: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("info"),
  /** seconds between the Leader's aggregation and collect passes */
  jobInterval: z.number().int().positive().default(5),
  global: globalConfigSchema,
  tasks: z.array(taskConfigSchema).default([]),
  tokens: tokensSchema.extend({
    tasks: z.record(z.string(), tokensSchema).default({}),
  }),
  hpkeReceivers: z
    .array(z.object({ config: hpkeConfigSchema, privateKey: base64url }))
    .nonempty(),
  taskprov: z
    .object({
      verifyKeyInit: base64url,
      collectorHpkeConfig: hpkeConfigSchema,
    })
    .optional(),
});

export interface TaskprovSettings {
  /** input keying material the per-task verify keys are derived from */
  verifyKeyInit: Buffer;
  collectorHpkeConfig: HpkeConfig;
}

export interface DeploymentConfig {
  role: "leader" | "helper";
  port: number;
  logLevel: LogLevel;
  jobInterval: number;
  global: GlobalConfig;
  tasks: TaskConfig[];
  tokens: TaskTokens & { tasks: Record<string, TaskTokens> };
  hpkeReceivers: HpkeReceiverConfig[];
  taskprov?: TaskprovSettings;
}

/**
   Validates a deployment file's contents and imports its HPKE private
   keys.
*/
export async function loadDeploymentConfig(
  input: unknown,
): Promise<DeploymentConfig> {
  const parsed = deploymentConfigSchema.parse(input);
  const hpkeReceivers = await Promise.all(
    parsed.hpkeReceivers.map(({ config, privateKey }) =>
      HpkeReceiverConfig.fromPrivateKey(config, privateKey),
    ),
  );
  return { ...parsed, hpkeReceivers };
}
