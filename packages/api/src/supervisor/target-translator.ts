import type { Target, TargetSets } from "@scrape-supervisor/shared";

/**
 * Translate discovery targets into the engine's target set representation.
 *
 * Always yields exactly one group under `instanceId`, even for an empty
 * target list: the engine only drops previously active targets when it
 * receives an explicit empty group.
 */
export function translateTargets(
  instanceId: string,
  targets: readonly Target[],
): TargetSets {
  return {
    [instanceId]: [
      {
        source: instanceId,
        labels: {},
        targets: targets.map((t) => ({ ...t })),
      },
    ],
  };
}
