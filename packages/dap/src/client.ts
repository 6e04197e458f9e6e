import { Buffer } from "buffer";
import type { Vdaf } from "@tally/vdaf";
import { TaskId } from "./id.js";
import { ReportId } from "./reportId.js";
import { Report, ReportMetadata, InputShareAad } from "./report.js";
import { HpkeConfig } from "./hpkeConfig.js";
import { Extension } from "./extension.js";
import { DAPError } from "./errors.js";
import { MEDIA_TYPES } from "./constants.js";
import { Aggregator } from "./aggregator.js";

export interface ReportOptions {
  timestamp?: Date;
}

/**
   Parameters from which to build a Client
   @typeParam Measurement The Measurement for the provided vdaf, usually inferred from the vdaf.
*/
export interface ClientParameters<Measurement> {
  /**
     The task identifier, either as a Buffer, a {@linkcode TaskId} or a
     base64url-encoded string
  **/
  taskId: TaskId | Buffer | string;
  /** the url of the leader aggregator */
  leader: string | URL;
  /** the url of the helper aggregator */
  helper: string | URL;
  /**
     The task's time precision, in seconds. Report timestamps will be
     rounded down to a multiple of this.
   */
  timePrecisionSeconds: number;
  vdaf: Vdaf<Measurement, unknown>;
  /** extensions to attach to every report, such as a taskprov definition */
  extensions?: Extension[];
  /**
     Key configuration to use instead of fetching it from each
     aggregator's `hpke_config` endpoint.
   */
  hpkeConfigs?: { leader: HpkeConfig; helper: HpkeConfig };
}

type Fetch = (
  input: RequestInfo,
  init?: RequestInit | undefined,
) => Promise<Response>;

/**
   Produces reports for one task and uploads them to its Leader.
*/
export class Client<Measurement> {
  #vdaf: Vdaf<Measurement, unknown>;
  #taskId: TaskId;
  #aggregators: [Aggregator, Aggregator];
  #timePrecisionSeconds: number;
  #extensions: Extension[];
  #fetch: Fetch = globalThis.fetch.bind(globalThis);

  constructor(parameters: ClientParameters<Measurement>) {
    this.#vdaf = parameters.vdaf;
    this.#taskId = taskIdFromDefinition(parameters.taskId);
    this.#aggregators = [
      Aggregator.leader(parameters.leader, parameters.hpkeConfigs?.leader),
      Aggregator.helper(parameters.helper, parameters.hpkeConfigs?.helper),
    ];
    if (typeof parameters.timePrecisionSeconds !== "number") {
      throw new Error("timePrecisionSeconds must be a number");
    }
    this.#timePrecisionSeconds = parameters.timePrecisionSeconds;
    this.#extensions = parameters.extensions ?? [];
  }

  get taskId(): TaskId {
    return this.#taskId;
  }

  /** @internal */
  //this exists for testing, and should not be considered part of the public api.
  set fetch(fetch: Fetch) {
    this.#fetch = fetch;
  }

  /**
     Produce a {@linkcode Report} from the supplied Measurement.

     This may make network requests to fetch key configuration from the
     leader and helper, if needed.
   */
  async generateReport(
    measurement: Measurement,
    options?: ReportOptions,
  ): Promise<Report> {
    await this.fetchKeyConfiguration();
    const reportId = ReportId.random();
    const { publicShare, inputShares } = await this.#vdaf.shard(
      measurement,
      reportId.encode(),
    );

    const time = roundedTime(this.#timePrecisionSeconds, options?.timestamp);
    const metadata = new ReportMetadata(reportId, time, this.#extensions);
    const aad = new InputShareAad(this.#taskId, metadata, publicShare);
    const ciphertexts = await Promise.all(
      this.#aggregators.map((aggregator, i) =>
        aggregator.seal(inputShares[i], aad),
      ),
    );

    return new Report(this.#taskId, metadata, publicShare, ciphertexts);
  }

  /**
     Sends a pregenerated {@linkcode Report} to the leader aggregator.

     @throws {@linkcode DAPError} if the response is not Ok.
   */
  async sendReport(report: Report): Promise<void> {
    const [leader] = this.#aggregators;
    const response = await this.#fetch(
      new URL("upload", leader.url).toString(),
      {
        method: "PUT",
        headers: { "Content-Type": MEDIA_TYPES.REPORT },
        body: new Uint8Array(report.encode()),
      },
    );

    if (!response.ok) {
      throw await DAPError.fromResponse(response, "report upload failed");
    }
  }

  async sendMeasurement(
    measurement: Measurement,
    options?: ReportOptions,
  ): Promise<void> {
    await this.sendReport(await this.generateReport(measurement, options));
  }

  /**
     Fetches hpke configuration from any aggregator that does not have
     one yet.

     @throws {@linkcode DAPError} if any response is not Ok.
   */
  async fetchKeyConfiguration(): Promise<void> {
    await Promise.all(
      this.#aggregators.map(async (aggregator) => {
        if (aggregator.hpkeConfig) return;
        const url = new URL("hpke_config", aggregator.url);
        url.searchParams.append("task_id", this.#taskId.toString());

        const response = await this.#fetch(url.toString(), {
          headers: { Accept: MEDIA_TYPES.HPKE_CONFIG },
        });

        if (!response.ok) {
          throw await DAPError.fromResponse(
            response,
            `fetchKeyConfiguration received a ${response.status} response, aborting`,
          );
        }

        const contentType = response.headers.get("Content-Type");
        if (contentType !== MEDIA_TYPES.HPKE_CONFIG) {
          throw new Error(
            `expected ${MEDIA_TYPES.HPKE_CONFIG} content-type header, aborting`,
          );
        }

        aggregator.hpkeConfig = HpkeConfig.parse(
          await response.arrayBuffer(),
        );
      }),
    );
  }
}

function taskIdFromDefinition(
  taskIdDefinition: Buffer | TaskId | string,
): TaskId {
  if (taskIdDefinition instanceof TaskId) return taskIdDefinition;
  else return new TaskId(taskIdDefinition);
}

function roundedTime(timePrecisionSeconds: number, date?: Date): number {
  const epochSeconds = (date ? date.getTime() : Date.now()) / 1000;
  return Math.floor(epochSeconds / timePrecisionSeconds) * timePrecisionSeconds;
}
