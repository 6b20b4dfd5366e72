import type { ParameterSet, ParameterValue } from "@strategy-lab/sdk";

/** Candidate values per parameter name, in registration order. */
export type ParameterRanges = ReadonlyMap<string, ReadonlyArray<ParameterValue>>;

/**
 * Cartesian product of `ranges`. The first registered name varies slowest.
 * Names registered with no values are left out; no usable ranges yields `[]`.
 */
export const generateParameterGrid = (ranges: ParameterRanges): ParameterSet[] => {
  let combinations: Record<string, ParameterValue>[] = [{}];
  let dimensions = 0;

  for (const [name, values] of ranges) {
    if (values.length === 0) {
      continue;
    }
    dimensions += 1;
    const next: Record<string, ParameterValue>[] = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [name]: value });
      }
    }
    combinations = next;
  }

  if (dimensions === 0) {
    return [];
  }
  return combinations.map((combination) => Object.freeze(combination));
};

/** Number of combinations {@link generateParameterGrid} would produce. */
export const countCombinations = (ranges: ParameterRanges): number => {
  let total = 0;
  for (const values of ranges.values()) {
    if (values.length === 0) {
      continue;
    }
    total = total === 0 ? values.length : total * values.length;
  }
  return total;
};
