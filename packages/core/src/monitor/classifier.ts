/**
 * CPU-sample hysteresis classifier.
 *
 * A session flips between IDLE and RUNNING only after `samples` consecutive
 * readings agree, so a single noisy sample never causes a transition.
 */

import type { ActivityClassifier, ActivityState } from "../registry/index.js";

export interface HysteresisOptions {
  /** A sample strictly above this CPU percentage counts as busy */
  threshold: number;
  /** Consecutive agreeing samples required to change status */
  samples: number;
}

export const DEFAULT_HYSTERESIS: HysteresisOptions = {
  threshold: 5,
  samples: 2,
};

export function classifySample(
  state: ActivityState,
  cpuPercent: number,
  options: HysteresisOptions = DEFAULT_HYSTERESIS
): ActivityState {
  const busy = cpuPercent > options.threshold;
  const highStreak = busy ? state.highStreak + 1 : 0;
  const lowStreak = busy ? 0 : state.lowStreak + 1;

  let status = state.status;
  if (highStreak >= options.samples && status !== "RUNNING") {
    status = "RUNNING";
  } else if (lowStreak >= options.samples && status !== "IDLE") {
    status = "IDLE";
  }

  return { status, highStreak, lowStreak };
}

export function createHysteresisClassifier(
  options: HysteresisOptions = DEFAULT_HYSTERESIS
): ActivityClassifier {
  return (state, cpuPercent) => classifySample(state, cpuPercent, options);
}
