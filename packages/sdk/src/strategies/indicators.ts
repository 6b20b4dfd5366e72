export const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
};

/** Population standard deviation (divides by N). */
export const standardDeviation = (values: ReadonlyArray<number>, average = mean(values)): number => {
  if (values.length === 0) {
    return 0;
  }
  const variance =
    values.reduce((acc, value) => {
      const diff = value - average;
      return acc + diff * diff;
    }, 0) / values.length;
  return Math.sqrt(variance);
};

/** Appends `value` and drops the oldest entries beyond `capacity`. */
export const pushWindow = (window: number[], value: number, capacity: number): void => {
  window.push(value);
  while (window.length > capacity) {
    window.shift();
  }
};
