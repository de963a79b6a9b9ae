import { setTimeout as delay } from "timers/promises";
import type { ClockPort } from "./ports.js";

export const systemClock: ClockPort = {
  now: () => new Date(),
  sleep: async (ms) => {
    if (ms <= 0) return;
    await delay(ms);
  },
};
