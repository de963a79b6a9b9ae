/**
 * gh.ts — thin client over the `gh api` command
 *
 * Authentication is whatever `gh auth` already holds. Every response is
 * validated against a zod schema before it reaches the adapters.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

const GH_TIMEOUT_MS = 60_000;

export type GhExec = (args: readonly string[]) => Promise<string>;

export class GhCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | string | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | string | null, stderr: string, message?: string) {
    super(message ?? `gh ${args.slice(0, 3).join(" ")} failed${exitCode !== null ? ` (${exitCode})` : ""}: ${stderr || "no output"}`);
    this.name = "GhCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

function fieldOf(error: unknown, key: string): unknown {
  if (!error || typeof error !== "object") return undefined;
  return key in error ? Reflect.get(error, key) : undefined;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf-8");
  return "";
}

export const execGh: GhExec = async (args) => {
  try {
    const { stdout } = await execFileAsync("gh", [...args], {
      encoding: "utf-8",
      timeout: GH_TIMEOUT_MS,
      maxBuffer: 10 * 1024 * 1024,
    });
    return stdout;
  } catch (error: unknown) {
    const code = fieldOf(error, "code");
    const exitCode = typeof code === "number" || typeof code === "string" ? code : null;
    const stderr = asText(fieldOf(error, "stderr")).trim();
    const fallback = error instanceof Error ? error.message : String(error);
    throw new GhCommandError(args, exitCode, stderr || fallback);
  }
};

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export interface GhRequest {
  method?: HttpMethod;
  /** Sent as `-f key=value` (always strings). */
  fields?: Record<string, string>;
  /** Sent as `-F key=value` (booleans and numbers keep their type). */
  typedFields?: Record<string, string | number | boolean>;
}

export function buildApiArgs(endpoint: string, request: GhRequest = {}): string[] {
  const args = ["api", endpoint];
  if (request.method && request.method !== "GET") args.push("--method", request.method);
  for (const [key, value] of Object.entries(request.fields ?? {})) {
    args.push("-f", `${key}=${value}`);
  }
  for (const [key, value] of Object.entries(request.typedFields ?? {})) {
    args.push("-F", `${key}=${String(value)}`);
  }
  return args;
}

const userSchema = z.object({ login: z.string().min(1) });

export class GhClient {
  private readonly exec: GhExec;

  constructor(exec: GhExec = execGh) {
    this.exec = exec;
  }

  async request<T>(schema: z.ZodType<T>, endpoint: string, request: GhRequest = {}): Promise<T> {
    const args = buildApiArgs(endpoint, request);
    const stdout = await this.exec(args);

    let payload: unknown;
    try {
      payload = JSON.parse(stdout);
    } catch {
      throw new GhCommandError(args, null, stdout.slice(0, 200), `gh ${endpoint} returned invalid JSON`);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "schema mismatch";
      throw new GhCommandError(args, null, where, `gh ${endpoint} returned an unexpected shape (${where})`);
    }
    return parsed.data;
  }

  /** For endpoints whose body we don't need (DELETE returns nothing). */
  async send(endpoint: string, request: GhRequest = {}): Promise<void> {
    await this.exec(buildApiArgs(endpoint, request));
  }

  async currentLogin(): Promise<string> {
    const user = await this.request(userSchema, "user");
    return user.login;
  }
}
