export * from "./types.js";
export * from "./time.js";
export * from "./cooldown.js";
export * from "./programClock.js";
export * from "./adherence.js";
export * from "./settlement.js";
