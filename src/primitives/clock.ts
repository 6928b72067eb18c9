/**
 * @module primitives/clock
 * @description Time source for envelope timestamps and transit telemetry.
 */

import { toSeconds } from "../types/branded.js";
import type { Seconds } from "../types/branded.js";

/** Returns the current time in seconds (float). */
export type Clock = () => Seconds;

/** Wall clock, millisecond resolution. */
export const systemClock: Clock = () => toSeconds(Date.now() / 1000);
