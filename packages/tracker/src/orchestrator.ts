/**
 * orchestrator.ts — wires the core to concrete ports
 *
 * check → plan → (optionally) run the immediate workflows → (optionally)
 * re-check. Progress and workflow outcomes are also written to telemetry
 * when a path is configured.
 */

import {
  TimedWorkflowEngine,
  allDefinitions,
  buildEarningPlan,
  computeAllProgress,
  emitPlanBuilt,
  emitProgressChecked,
  emitWorkflowCompleted,
  emitWorkflowTransition,
  systemClock,
} from "@badge-engine/architecture";
import type {
  AchievementDefinition,
  AchievementProgress,
  ArtifactPort,
  ClockPort,
  CompletedWorkflowRun,
  EarningPlan,
  EngineConfig,
  MetricSourcePort,
  WorkflowKind,
} from "@badge-engine/architecture";

export interface BadgeOrchestratorOptions {
  metrics: MetricSourcePort;
  artifacts: ArtifactPort;
  config: EngineConfig;
  clock?: ClockPort;
  definitions?: readonly AchievementDefinition[];
  /** Set to false to suppress the per-achievement "Checking ..." lines. */
  verbose?: boolean;
}

export interface EarnOptions {
  execute?: boolean;
  verify?: boolean;
}

export interface EarnResult {
  plan: EarningPlan;
  runs: CompletedWorkflowRun[];
  /** Present only when verification ran. */
  verified?: AchievementProgress[];
}

export class BadgeOrchestrator {
  private readonly metrics: MetricSourcePort;
  private readonly config: EngineConfig;
  private readonly clock: ClockPort;
  private readonly definitions: readonly AchievementDefinition[];
  private readonly verbose: boolean;
  private readonly engine: TimedWorkflowEngine;

  constructor(options: BadgeOrchestratorOptions) {
    this.metrics = options.metrics;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.definitions = options.definitions ?? allDefinitions();
    this.verbose = options.verbose ?? true;

    const telemetryPath = options.config.telemetryPath;
    this.engine = new TimedWorkflowEngine({
      artifacts: options.artifacts,
      clock: this.clock,
      fastClose: {
        delayMs: options.config.fastClose.delayMs,
        comment: options.config.fastClose.comment,
        containerPrefix: options.config.fastClose.containerPrefix,
      },
      unreviewedMerge: {
        containerPrefix: options.config.unreviewedMerge.containerPrefix,
      },
      onTransition: (run, from, to) => {
        emitWorkflowTransition(telemetryPath, { runId: run.runId, kind: run.kind, from, to });
      },
    });
  }

  async checkProgress(actor: string): Promise<AchievementProgress[]> {
    const progressList = await computeAllProgress(this.definitions, this.metrics, actor, {
      clock: this.clock,
      onProgress: (definition) => {
        if (this.verbose) console.log(`[progress] Checking ${definition.name}...`);
      },
    });
    emitProgressChecked(this.config.telemetryPath, actor, progressList);
    return progressList;
  }

  async buildPlan(actor: string, progressList?: readonly AchievementProgress[]): Promise<EarningPlan> {
    const progress = progressList ?? (await this.checkProgress(actor));
    const plan = buildEarningPlan(actor, progress, { now: this.clock.now() });
    emitPlanBuilt(this.config.telemetryPath, plan);
    return plan;
  }

  async runWorkflow(kind: WorkflowKind): Promise<CompletedWorkflowRun> {
    const run = await this.engine.run(kind);
    emitWorkflowCompleted(this.config.telemetryPath, run);
    return run;
  }

  /** Runs every automated immediate entry one after another, pausing between runs. */
  async executeImmediate(plan: EarningPlan): Promise<CompletedWorkflowRun[]> {
    const runs: CompletedWorkflowRun[] = [];
    for (const entry of plan.entries.immediate) {
      if (entry.guidance.kind !== "automated") continue;
      if (runs.length > 0 && this.config.execution.pauseBetweenRunsMs > 0) {
        await this.clock.sleep(this.config.execution.pauseBetweenRunsMs);
      }
      const { name } = entry.progress.definition;
      console.log(`[earn] Executing ${name}...`);
      const run = await this.runWorkflow(entry.guidance.workflow);
      if (run.result.status === "failure") {
        console.log(`[earn] ${name} failed: ${run.result.reason.message}`);
      } else {
        console.log(`[earn] ${name} succeeded`);
      }
      runs.push(run);
    }
    return runs;
  }

  /** Waits for the service to settle, then re-queries progress. */
  async verify(actor: string): Promise<AchievementProgress[]> {
    const settleMs = this.config.execution.verifySettleMs;
    if (settleMs > 0) {
      console.log(`[earn] Waiting ${Math.round(settleMs / 1000)}s for GitHub to update...`);
      await this.clock.sleep(settleMs);
    }
    return this.checkProgress(actor);
  }

  async earn(actor: string, options: EarnOptions = {}): Promise<EarnResult> {
    const plan = await this.buildPlan(actor);
    if (!options.execute) return { plan, runs: [] };

    const runs = await this.executeImmediate(plan);
    if (!options.verify) return { plan, runs };

    const verified = await this.verify(actor);
    return { plan, runs, verified };
  }
}
