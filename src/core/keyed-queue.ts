import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger("keyed-queue");

type WorkFn = () => Promise<void>;

/**
 * Per-key work queue. Work for one key runs strictly in push order;
 * different keys run independently of each other.
 */
export class KeyedQueue {
  private readonly chains = new Map<string, Promise<void>>();

  push(key: string, work: WorkFn): void {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const next = previous.then(work).catch((err: unknown) => {
      log.error({ err, key }, "Queued work failed, continuing chain");
    });
    this.chains.set(key, next);

    void next.finally(() => {
      // Clean up if this was the last queued item
      if (this.chains.get(key) === next) {
        this.chains.delete(key);
      }
    });
  }

  get size(): number {
    return this.chains.size;
  }

  /** Resolves once every chain pushed so far has drained. */
  async idle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }
}
