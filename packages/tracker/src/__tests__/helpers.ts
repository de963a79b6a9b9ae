/**
 * helpers.ts — Scripted `gh` runner for adapter tests
 */

import type { GhExec } from "../gh.js";

export {
  FakeMetricSource,
  InstantClock,
  RecordingArtifactPort,
  START,
  TEST_ACTOR,
} from "../../../architecture/src/__tests__/helpers.js";

type Handler = (args: readonly string[]) => unknown;

/**
 * Answers `gh` invocations by endpoint (the argument after "api"). Replies are
 * serialised to JSON; a returned Error is thrown instead. Unscripted endpoints
 * fail.
 */
export class ScriptedGh {
  readonly invocations: string[][] = [];
  private readonly handlers = new Map<string, Handler>();

  on(endpoint: string, body: unknown): this {
    return this.respond(endpoint, () => body);
  }

  respond(endpoint: string, handler: Handler): this {
    this.handlers.set(endpoint, handler);
    return this;
  }

  readonly exec: GhExec = async (args) => {
    this.invocations.push([...args]);
    const endpoint = args[1] ?? "";
    const handler = this.handlers.get(endpoint);
    if (!handler) throw new Error(`unscripted gh call: ${endpoint}`);
    const body = handler(args);
    if (body instanceof Error) throw body;
    return body === undefined ? "" : JSON.stringify(body);
  };

  endpoints(): string[] {
    return this.invocations.map((args) => args[1] ?? "");
  }
}
