/**
 * Dashboard: folds poller events into a state and redraws once per cycle.
 *
 * Memory is sampled last in every cycle, so the memory event (or the
 * memory stage failing) marks the end of a cycle.
 */

import type { EventBus } from "@plantop/sdk";
import { PollerEventType } from "@plantop/sdk";
import { renderDashboard } from "./render.js";
import type { DashboardState, RenderOptions } from "./render.js";

export type DashboardWriter = (frame: string) => void;

export interface Dashboard {
  getState(): Readonly<DashboardState>;
  /** Unsubscribe from the bus. */
  dispose(): void;
}

const CLEAR_SCREEN = "\x1b[2J\x1b[H";

/** Writer that clears the terminal and prints the frame to stdout. */
export function terminalWriter(frame: string): void {
  process.stdout.write(`${CLEAR_SCREEN}${frame}\n`);
}

export function createDashboard(
  bus: EventBus,
  host: string,
  options: RenderOptions,
  write: DashboardWriter = terminalWriter,
): Dashboard {
  const state: DashboardState = { host, plans: new Map() };

  function redraw(): void {
    write(renderDashboard(state, options).join("\n"));
  }

  const unsubscribe = bus.onAny((event) => {
    switch (event.type) {
      case PollerEventType.PLANCACHE_CHANGED:
        state.plans = event.payload;
        state.lastError = undefined;
        break;
      case PollerEventType.CPU_UTIL_CHANGED:
        state.cpuUtilization = event.payload;
        break;
      case PollerEventType.MEM_USAGE_CHANGED:
        state.memoryUsage = event.payload;
        redraw();
        break;
      case PollerEventType.POLL_ERROR:
        state.lastError = `${event.payload.stage}: ${event.payload.error.message}`;
        if (event.payload.stage === "memory") redraw();
        break;
    }
  });

  return {
    getState: () => state,
    dispose: unsubscribe,
  };
}
