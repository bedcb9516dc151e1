import cron, { type ScheduledTask } from "node-cron";
import type { AggregateResult, FeedFailure } from "./types/feed";
import { logger, type Logger } from "./lib/logger";
import { SnapshotStore } from "./lib/snapshot";

export type RefreshState = "idle" | "refreshing" | "stopped";

/** What makes a pass start besides an explicit trigger(). */
export type RefreshTrigger =
  | { kind: "interval"; seconds: number }
  | { kind: "cron"; expression: string };

export type RefreshTask = () => Promise<AggregateResult>;

export type SchedulerOptions = {
  trigger: RefreshTrigger;
  log?: Logger;
};

/**
 * A pass is worth publishing if any feed answered, or there were no
 * feeds at all. A pass where every feed failed keeps the old snapshot.
 */
export function isUsable(result: AggregateResult): boolean {
  return result.feedsOk > 0 || result.feedsFailed === 0;
}

/**
 * Runs refresh passes in the background: idle → refreshing → idle.
 *
 * Interval mode waits `seconds` after a pass ends before starting the next,
 * so passes never overlap. Cron mode fires on the expression; a tick that
 * lands during a pass joins it.
 */
export class RefreshScheduler {
  private state: RefreshState = "idle";
  private inflight: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private cronTask: ScheduledTask | null = null;
  private lastErrors: readonly FeedFailure[] = [];
  private readonly log: Logger;

  constructor(
    private readonly task: RefreshTask,
    private readonly store: SnapshotStore,
    private readonly opts: SchedulerOptions
  ) {
    this.log = opts.log ?? logger.child({ module: "scheduler" });
    if (opts.trigger.kind === "cron" && !cron.validate(opts.trigger.expression)) {
      throw new Error(`Invalid cron expression: ${opts.trigger.expression}`);
    }
  }

  get status(): RefreshState {
    return this.state;
  }

  /** Failures of the most recent pass, published or not. */
  get errors(): readonly FeedFailure[] {
    return this.lastErrors;
  }

  /** Run one pass now, then keep going on the configured trigger. */
  start(): Promise<void> {
    const first = this.trigger();
    const trigger = this.opts.trigger;
    if (trigger.kind === "cron") {
      this.cronTask = cron.schedule(trigger.expression, () => {
        void this.trigger().catch((e) =>
          this.log.error({ err: e }, "refresh tick failed")
        );
      });
    } else {
      // runPass catches everything, so `first` only ever resolves
      void first.then(() => this.armTimer());
    }
    return first;
  }

  /** Start a pass unless one is running; either way resolve when it ends. */
  trigger(): Promise<void> {
    if (this.state === "stopped") return Promise.resolve();
    if (this.inflight) return this.inflight;

    this.state = "refreshing";
    this.inflight = this.runPass().finally(() => {
      this.inflight = null;
      if (this.state === "refreshing") this.state = "idle";
    });
    return this.inflight;
  }

  /** Cancel future passes; resolves once an in-flight pass has finished. */
  stop(): Promise<void> {
    this.state = "stopped";
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.cronTask?.stop();
    this.cronTask = null;
    return this.inflight ?? Promise.resolve();
  }

  private armTimer(): void {
    const trigger = this.opts.trigger;
    if (this.state === "stopped" || trigger.kind !== "interval") return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.trigger()
        .catch((e) => this.log.error({ err: e }, "refresh tick failed"))
        .finally(() => this.armTimer());
    }, trigger.seconds * 1000);
  }

  private async runPass(): Promise<void> {
    const started = Date.now();
    try {
      const result = await this.task();
      this.lastErrors = result.errors;
      if (!isUsable(result)) {
        this.log.warn(
          { failed: result.feedsFailed },
          "every feed failed; keeping previous snapshot"
        );
        return;
      }
      this.store.publish(result.snapshot);
      this.log.info(
        {
          items: result.snapshot.items.length,
          ok: result.feedsOk,
          failed: result.feedsFailed,
          ms: Date.now() - started,
        },
        "snapshot refreshed"
      );
    } catch (e) {
      this.log.error({ err: e }, "refresh pass crashed; keeping previous snapshot");
    }
  }
}
