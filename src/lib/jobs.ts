import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";
import type { MemoryStore } from "@/lib/store/memory";
import { getRuntimeStore, persistRuntimeStore } from "@/lib/store/runtime";
import { nowIso } from "@/lib/utils";

export interface JobContext {
  config: AppConfig;
  logger: Logger;
  store?: MemoryStore;
}

async function resolveStore(ctx: JobContext) {
  return ctx.store ?? getRuntimeStore(ctx.config, ctx.logger);
}

export async function runReevaluateUnderReviewJob(ctx: JobContext) {
  const store = await resolveStore(ctx);
  const executedAt = nowIso();
  const decided: Array<{ scrollId: string; decision: string; nextStatus: string }> = [];
  for (const scroll of store.listScrolls({ status: "under_review" })) {
    const record = store.transaction((s) => s.evaluateScroll(scroll.id, ctx.config.policy));
    if (record && record.decision !== "insufficient_reviews") {
      decided.push({ scrollId: scroll.id, decision: record.decision, nextStatus: record.nextStatus });
    }
  }
  await persistRuntimeStore(ctx.config, store);
  ctx.logger.info("re-evaluated scrolls under review", { decided: decided.length });
  return { job: "reevaluate-under-review", decided, executedAt };
}

export async function runRecheckReproGatesJob(ctx: JobContext) {
  const store = await resolveStore(ctx);
  const executedAt = nowIso();
  const results: Array<{ scrollId: string; passed: boolean; reason: string }> = [];
  for (const scroll of store.listScrolls({ status: "repro_check" })) {
    const gate = store.transaction((s) => s.processReproGate(scroll.id));
    results.push({ scrollId: scroll.id, ...gate });
  }
  await persistRuntimeStore(ctx.config, store);
  ctx.logger.info("re-checked reproducibility gates", {
    checked: results.length,
    published: results.filter((r) => r.passed).length
  });
  return { job: "recheck-repro-gates", results, executedAt };
}

export async function runRecomputeScholarMetricsJob(ctx: JobContext) {
  const store = await resolveStore(ctx);
  const executedAt = nowIso();
  const updated = store.transaction((s) =>
    s.listScholars().map((scholar) => {
      const next = s.recomputeScholarMetrics(scholar.id);
      return { scholarId: scholar.id, reputationScore: next?.reputationScore ?? 0, trustTier: next?.trustTier ?? "new" };
    })
  );
  await persistRuntimeStore(ctx.config, store);
  ctx.logger.info("recomputed scholar metrics", { scholars: updated.length });
  return { job: "recompute-scholar-metrics", updated, executedAt };
}

export async function runMaintenanceJob(ctx: JobContext) {
  const executedAt = nowIso();
  const reevaluate = await runReevaluateUnderReviewJob(ctx);
  const repro = await runRecheckReproGatesJob(ctx);
  const metrics = await runRecomputeScholarMetricsJob(ctx);
  return {
    job: "maintenance",
    executedAt,
    steps: {
      reevaluateUnderReview: reevaluate,
      recheckReproGates: repro,
      recomputeScholarMetrics: metrics
    }
  };
}
