import { Role } from "./constants.js";
import { InputShareAad, InputShareInfo } from "./report.js";
import { HpkeCiphertext } from "./ciphertext.js";
import { HpkeConfig } from "./hpkeConfig.js";
import { Buffer } from "buffer";

/**
   One of the two aggregators a Client seals input shares to.
*/
export class Aggregator {
  public url: URL;
  constructor(
    url: URL | string,
    public role: Role.Leader | Role.Helper,
    public hpkeConfig?: HpkeConfig,
  ) {
    this.url = new URL(url);
    if (!this.url.pathname.endsWith("/")) {
      this.url.pathname += "/";
    }
  }

  static helper(url: string | URL, hpkeConfig?: HpkeConfig): Aggregator {
    return new Aggregator(url, Role.Helper, hpkeConfig);
  }

  static leader(url: string | URL, hpkeConfig?: HpkeConfig): Aggregator {
    return new Aggregator(url, Role.Leader, hpkeConfig);
  }

  async seal(inputShare: Buffer, aad: InputShareAad): Promise<HpkeCiphertext> {
    if (!this.hpkeConfig) {
      throw new Error(
        "Attempted to call Aggregator#seal before fetching an hpkeConfig.",
      );
    }
    return await this.hpkeConfig.seal(
      new InputShareInfo(this.role).encode(),
      inputShare,
      aad.encode(),
    );
  }
}
