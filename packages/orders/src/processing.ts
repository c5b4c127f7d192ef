/**
 * Order processing phases.
 *
 * Background order creation runs a fixed sequence of phases before the
 * order is written. Each phase is a separate unit that may fail on its
 * own; the default phases only wait out a simulated delay.
 */

import type { OrderInput } from "@ordergrid/types";

export type Sleep = (ms: number) => Promise<void>;

export interface ProcessingPhase {
  readonly name: string;
  run(input: OrderInput): Promise<void>;
}

export const DEFAULT_PHASE_NAMES = ["validation", "inventory", "payment"] as const;

export const DEFAULT_PHASE_DELAY_MS = 2000;

export const realSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface SimulatedPhaseOptions {
  /** Delay per phase in milliseconds. Default: 2000 */
  readonly delayMs?: number | undefined;
  readonly sleep?: Sleep | undefined;
}

/**
 * validation → inventory → payment, each a simulated delay.
 */
export function simulatedPhases(options: SimulatedPhaseOptions = {}): readonly ProcessingPhase[] {
  const delayMs = options.delayMs ?? DEFAULT_PHASE_DELAY_MS;
  const sleep = options.sleep ?? realSleep;

  return DEFAULT_PHASE_NAMES.map((name) => ({
    name,
    run: async () => {
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    },
  }));
}
