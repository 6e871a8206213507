/**
 * A single scrape endpoint and the outcome of its latest scrape.
 */

import type {
  ActiveTarget,
  LabelSet,
  ScrapeJobConfig,
  TargetGroup,
  TargetHealth,
} from "@scrape-supervisor/shared";

const ADDRESS_LABEL = "__address__";
const SCHEME_LABEL = "__scheme__";
const METRICS_PATH_LABEL = "__metrics_path__";
const PARAM_LABEL_PREFIX = "__param_";
const RESERVED_LABEL_PREFIX = "__";

export class ScrapeTarget implements ActiveTarget {
  readonly scrapeUrl: URL;
  private targetLabels: LabelSet;

  private currentHealth: TargetHealth = "unknown";
  private currentError: Error | null = null;
  private lastScrapeAt: Date | null = null;
  private lastDurationMs = 0;

  constructor(scrapeUrl: URL, labels: LabelSet) {
    this.scrapeUrl = scrapeUrl;
    this.targetLabels = labels;
  }

  /** Identity of the target: same URL and labels means same target */
  get key(): string {
    const sorted = Object.keys(this.targetLabels)
      .sort()
      .map((k) => [k, this.targetLabels[k]]);
    return `${this.scrapeUrl.href}|${JSON.stringify(sorted)}`;
  }

  url(): string {
    return this.scrapeUrl.href;
  }

  labels(): LabelSet {
    return { ...this.targetLabels };
  }

  health(): TargetHealth {
    return this.currentHealth;
  }

  lastError(): Error | null {
    return this.currentError;
  }

  lastScrape(): Date | null {
    return this.lastScrapeAt;
  }

  lastScrapeDurationMs(): number {
    return this.lastDurationMs;
  }

  /** Record the outcome of a completed scrape attempt */
  report(start: Date, durationMs: number, err: Error | null): void {
    this.currentHealth = err ? "down" : "up";
    this.currentError = err;
    this.lastScrapeAt = start;
    this.lastDurationMs = durationMs;
  }
}

/**
 * Turn one label set into a target. Returns null when the labels do not
 * describe a scrapeable endpoint (no address, bad scheme or URL).
 */
export function resolveTarget(
  targetLabels: LabelSet,
  cfg: ScrapeJobConfig,
): ScrapeTarget | null {
  const address = targetLabels[ADDRESS_LABEL];
  if (!address) return null;

  const scheme = targetLabels[SCHEME_LABEL] || cfg.scheme;
  if (scheme !== "http" && scheme !== "https") return null;
  const path = targetLabels[METRICS_PATH_LABEL] || cfg.metricsPath;

  const params = new Map(Object.entries(cfg.params));
  for (const [name, value] of Object.entries(targetLabels)) {
    if (name.startsWith(PARAM_LABEL_PREFIX)) {
      params.set(name.slice(PARAM_LABEL_PREFIX.length), [value]);
    }
  }

  let url: URL;
  try {
    url = new URL(`${scheme}://${address}${path}`);
  } catch {
    return null;
  }
  for (const [name, values] of params) {
    for (const value of values) url.searchParams.append(name, value);
  }

  const labels: LabelSet = {};
  for (const [name, value] of Object.entries(targetLabels)) {
    if (!name.startsWith(RESERVED_LABEL_PREFIX)) labels[name] = value;
  }
  if (!labels.job) labels.job = cfg.jobName;
  if (!labels.instance) labels.instance = address;

  return new ScrapeTarget(url, labels);
}

/** Resolve every target of a list of groups, dropping duplicates */
export function resolveGroups(
  groups: readonly TargetGroup[],
  cfg: ScrapeJobConfig,
): { targets: ScrapeTarget[]; dropped: number } {
  const byKey = new Map<string, ScrapeTarget>();
  let dropped = 0;

  for (const group of groups) {
    for (const t of group.targets) {
      const target = resolveTarget({ ...group.labels, ...t }, cfg);
      if (!target) {
        dropped++;
        continue;
      }
      if (!byKey.has(target.key)) byKey.set(target.key, target);
    }
  }

  return { targets: [...byKey.values()], dropped };
}
