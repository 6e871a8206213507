import type { ActiveTarget, TargetStatus } from "@scrape-supervisor/shared";

/**
 * Build a point-in-time status list from the engine's live target registry.
 * Jobs are listed in name order; missing target records are skipped.
 */
export function collectTargetStatus(
  active: ReadonlyMap<string, ReadonlyArray<ActiveTarget | null | undefined>>,
): TargetStatus[] {
  const result: TargetStatus[] = [];
  const jobs = [...active.keys()].sort();

  for (const jobName of jobs) {
    for (const target of active.get(jobName) ?? []) {
      if (!target) continue;

      const lastScrape = target.lastScrape();
      result.push({
        jobName,
        url: target.url(),
        health: target.health(),
        labels: { ...target.labels() },
        lastError: target.lastError()?.message ?? "",
        lastScrape: lastScrape ? lastScrape.toISOString() : null,
        lastScrapeDurationMs: target.lastScrapeDurationMs(),
      });
    }
  }

  return result;
}
