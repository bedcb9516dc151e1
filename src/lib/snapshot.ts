import type { Snapshot } from "../types/feed";
import { EMPTY_SNAPSHOT } from "../jobs/aggregate";

/**
 * The one shared reference to the current Snapshot.
 *
 * Written only by the refresh scheduler, read by request handlers and the
 * CLI. Snapshots are frozen and replaced wholesale, so a reader holding
 * the value from `current()` never sees part of a newer pass.
 */
export class SnapshotStore {
  private snapshot: Snapshot;

  constructor(initial: Snapshot = EMPTY_SNAPSHOT) {
    this.snapshot = initial;
  }

  current(): Snapshot {
    return this.snapshot;
  }

  publish(next: Snapshot): void {
    this.snapshot = Object.isFrozen(next) ? next : Object.freeze({ ...next });
  }
}
