import { Cron } from "croner";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("heartbeat");

export type HeartbeatFn = () => void | Promise<void>;

/**
 * Runs an operator hook every `intervalSec` seconds while the bridge is live.
 * Ticks are skipped, not queued, while disconnected or while the previous run is still busy.
 */
export class Heartbeat {
  private job: Cron | null = null;
  private runs = 0;

  constructor(
    private readonly fn: HeartbeatFn,
    private readonly intervalSec: number,
    private readonly isLive: () => boolean,
  ) {}

  start(): void {
    if (this.job) return;
    this.job = new Cron("* * * * * *", { interval: this.intervalSec, protect: true }, () => this.tick());
    log.info({ intervalSec: this.intervalSec }, "Heartbeat started");
  }

  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    log.info({ runs: this.runs }, "Heartbeat stopped");
  }

  get running(): boolean {
    return this.job !== null;
  }

  async tick(): Promise<void> {
    if (!this.isLive()) {
      log.trace("Heartbeat skipped, bridge not live");
      return;
    }
    this.runs++;
    try {
      await this.fn();
    } catch (err) {
      log.error({ err }, "Heartbeat hook failed");
    }
  }
}
