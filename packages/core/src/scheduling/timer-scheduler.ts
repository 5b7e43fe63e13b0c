/**
 * Scheduler backed by Node timers.
 */

import type { ScheduledTask, Scheduler } from "@plantop/sdk";

export function createTimerScheduler(): Scheduler {
  return {
    schedule(delaySeconds: number, callback: () => void): ScheduledTask {
      const timer = setTimeout(callback, delaySeconds * 1000);
      return {
        cancel(): void {
          clearTimeout(timer);
        },
      };
    },
  };
}
