import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { DEFAULT_CLOSE_COMMENT, DEFAULT_CONTAINER_PREFIXES, DEFAULT_FAST_CLOSE_DELAY_MS, MAX_WAIT_MS } from "./workflow.js";

export const CONFIG_FILE_NAME = "badge-engine.yaml";

export interface EngineConfig {
  fastClose: {
    delayMs: number;
    /** `null` closes without a comment. */
    comment: string | null;
    containerPrefix: string;
  };
  unreviewedMerge: {
    containerPrefix: string;
  };
  execution: {
    pauseBetweenRunsMs: number;
    verifySettleMs: number;
  };
  telemetryPath?: string;
}

const DEFAULT_CONFIG: EngineConfig = {
  fastClose: {
    delayMs: DEFAULT_FAST_CLOSE_DELAY_MS,
    comment: DEFAULT_CLOSE_COMMENT,
    containerPrefix: DEFAULT_CONTAINER_PREFIXES["fast-close"],
  },
  unreviewedMerge: {
    containerPrefix: DEFAULT_CONTAINER_PREFIXES["unreviewed-merge"],
  },
  execution: {
    pauseBetweenRunsMs: 2_000,
    verifySettleMs: 5_000,
  },
};

export function defaultEngineConfig(): EngineConfig {
  return {
    fastClose: { ...DEFAULT_CONFIG.fastClose },
    unreviewedMerge: { ...DEFAULT_CONFIG.unreviewedMerge },
    execution: { ...DEFAULT_CONFIG.execution },
  };
}

// ─── Reading badge-engine.yaml ───────────────────────────────────────────────

/** Every key the file may set, as a dotted path. */
export const CONFIG_KEYS = [
  "workflow.fast_close.delay_seconds",
  "workflow.fast_close.comment",
  "workflow.fast_close.container_prefix",
  "workflow.unreviewed_merge.container_prefix",
  "execution.pause_seconds",
  "execution.verify_settle_seconds",
  "telemetry.path",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>(CONFIG_KEYS);
const KNOWN_SECTIONS: ReadonlySet<string> = new Set(CONFIG_KEYS.map((key) => key.split(".")[0]));

/** Drops a trailing ` # comment`; a quoted value keeps any '#' inside the quotes. */
function stripComment(raw: string): string {
  const text = raw.trim();
  if (text.startsWith("#")) return "";
  const quote = text[0];
  if (quote === '"' || quote === "'") {
    const end = text.indexOf(quote, 1);
    if (end > 0) return text.slice(0, end + 1);
  }
  const comment = text.indexOf(" #");
  return comment === -1 ? text : text.slice(0, comment).trim();
}

function unquote(text: string): string {
  const quote = text[0];
  if ((quote === '"' || quote === "'") && text.length >= 2 && text.endsWith(quote)) {
    return text.slice(1, -1);
  }
  return text;
}

/**
 * Reads nested mappings of scalars into dotted keys
 * (`workflow.fast_close.delay_seconds`). Lists and multi-line values are not
 * part of the file format and are skipped.
 */
export function parseYamlScalars(content: string): Record<string, string> {
  const scalars: Record<string, string> = {};
  const sections: Array<{ indent: number; key: string }> = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/\t/g, "  ");
    const match = /^( *)([A-Za-z0-9_-]+):(?:\s(.*))?$/.exec(line);
    if (!match) continue;

    const indent = match[1].length;
    while (sections.length > 0 && sections[sections.length - 1].indent >= indent) sections.pop();

    const value = stripComment(match[3] ?? "");
    if (value === "") {
      sections.push({ indent, key: match[2] });
    } else {
      scalars[[...sections.map((section) => section.key), match[2]].join(".")] = unquote(value);
    }
  }

  return scalars;
}

function warnUnknownKeys(scalars: Record<string, string>): void {
  const reported = new Set<string>();
  for (const key of Object.keys(scalars)) {
    if (KNOWN_KEYS.has(key)) continue;
    const section = key.split(".")[0];
    if (KNOWN_SECTIONS.has(section)) {
      console.warn(`[config] Ignoring unknown key "${key}"`);
    } else if (!reported.has(section)) {
      reported.add(section);
      console.warn(`[config] Ignoring unknown section "${section}"`);
    }
  }
}

function readSeconds(value: string | undefined, fallbackMs: number, maxMs?: number): number {
  if (!value) return fallbackMs;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return fallbackMs;
  const ms = Math.round(parsed * 1000);
  return maxMs === undefined ? ms : Math.min(ms, maxMs);
}

function readString(value: string | undefined, fallback: string): string {
  return value && value.trim() ? value.trim() : fallback;
}

function readComment(value: string | undefined, fallback: string | null): string | null {
  if (value === undefined) return fallback;
  if (value === "none" || value === "false" || value === "") return null;
  return value;
}

export function engineConfigFromScalars(scalars: Record<string, string>): EngineConfig {
  warnUnknownKeys(scalars);
  const read = (key: ConfigKey): string | undefined => scalars[key];
  const defaults = defaultEngineConfig();
  const config: EngineConfig = {
    fastClose: {
      delayMs: readSeconds(
        read("workflow.fast_close.delay_seconds"),
        defaults.fastClose.delayMs,
        MAX_WAIT_MS,
      ),
      comment: readComment(read("workflow.fast_close.comment"), defaults.fastClose.comment),
      containerPrefix: readString(
        read("workflow.fast_close.container_prefix"),
        defaults.fastClose.containerPrefix,
      ),
    },
    unreviewedMerge: {
      containerPrefix: readString(
        read("workflow.unreviewed_merge.container_prefix"),
        defaults.unreviewedMerge.containerPrefix,
      ),
    },
    execution: {
      pauseBetweenRunsMs: readSeconds(
        read("execution.pause_seconds"),
        defaults.execution.pauseBetweenRunsMs,
      ),
      verifySettleMs: readSeconds(
        read("execution.verify_settle_seconds"),
        defaults.execution.verifySettleMs,
      ),
    },
  };

  const telemetryPath = read("telemetry.path");
  if (telemetryPath && telemetryPath.trim()) config.telemetryPath = telemetryPath.trim();
  return config;
}

/**
 * Load `badge-engine.yaml` (or an explicit path). A missing or unreadable
 * file yields the defaults; individual invalid values fall back one by one.
 */
export function loadEngineConfig(configPath?: string, cwd: string = process.cwd()): EngineConfig {
  const path = configPath ?? join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(path)) return defaultEngineConfig();

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[config] Could not read ${path}, using defaults: ${message}`);
    return defaultEngineConfig();
  }
  return engineConfigFromScalars(parseYamlScalars(content));
}
