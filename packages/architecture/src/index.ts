export * from "./domain.js";
export * from "./ports.js";
export * from "./errors.js";
export * from "./clock.js";
export * from "./catalogue.js";
export * from "./progress.js";
export * from "./planner.js";
export * from "./coauthor.js";
export * from "./workflow.js";
export * from "./report.js";
export * from "./engine-config.js";
export * from "./telemetry.js";
