/**
 * Liveness — subscribe-to-termination relationship
 *
 * A unit owns a Liveness and terminates it exactly once. Observers register
 * with monitor() and receive the termination reason asynchronously,
 * whatever the cause. Monitoring an already terminated unit notifies the
 * observer right away (still asynchronously), so a late monitor cannot miss
 * the termination.
 */
export type DownListener = (reason: string) => void;

export interface MonitorToken {
  /** Cancel the monitor; a pending notification is not delivered */
  demonitor(): void;
}

interface MonitorEntry {
  listener: DownListener;
  active: boolean;
}

export class Liveness {
  private readonly monitors = new Set<MonitorEntry>();
  private downReason: string | null = null;

  get isAlive(): boolean {
    return this.downReason === null;
  }

  get reason(): string | null {
    return this.downReason;
  }

  get monitorCount(): number {
    return this.monitors.size;
  }

  monitor(listener: DownListener): MonitorToken {
    const entry: MonitorEntry = { listener, active: true };

    if (this.downReason !== null) {
      this.notify(entry, this.downReason);
    } else {
      this.monitors.add(entry);
    }

    return {
      demonitor: () => {
        entry.active = false;
        this.monitors.delete(entry);
      },
    };
  }

  /** Mark the unit as terminated. Only the first call has any effect. */
  terminate(reason: string): boolean {
    if (this.downReason !== null) return false;
    this.downReason = reason;

    for (const entry of this.monitors) {
      this.notify(entry, reason);
    }
    this.monitors.clear();
    return true;
  }

  private notify(entry: MonitorEntry, reason: string): void {
    queueMicrotask(() => {
      if (!entry.active) return;
      entry.active = false;
      entry.listener(reason);
    });
  }
}
