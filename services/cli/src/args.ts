import { InvalidArgumentError } from "commander";

import {
  STRATEGY_KINDS,
  expandRange,
  isStrategyKind,
  type ParameterSet,
  type ParameterValue,
  type StrategyKind,
} from "@strategy-lab/sdk";

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/u;
const RANGE_PATTERN = /^(-?[\d.]+):(-?[\d.]+):([\d.]+)$/u;

/** `"true"`/`"false"` become booleans, numeric text becomes a number. */
export const parseParameterValue = (raw: string): ParameterValue => {
  const value = raw.trim();
  if (value === "true" || value === "false") {
    return value === "true";
  }
  if (NUMERIC_PATTERN.test(value)) {
    return Number(value);
  }
  return value;
};

const splitAssignment = (entry: string): [string, string] => {
  const separator = entry.indexOf("=");
  const name = separator > 0 ? entry.slice(0, separator).trim() : "";
  const value = separator > 0 ? entry.slice(separator + 1).trim() : "";
  if (name === "" || value === "") {
    throw new InvalidArgumentError(`Expected name=value, received "${entry}".`);
  }
  return [name, value];
};

/** Parses `name=value` entries. A later entry for the same name wins. */
export const parseParameterAssignments = (entries: ReadonlyArray<string>): ParameterSet => {
  const parameters: Record<string, ParameterValue> = {};
  for (const entry of entries) {
    const [name, value] = splitAssignment(entry);
    parameters[name] = parseParameterValue(value);
  }
  return parameters;
};

/**
 * Parses `name=v1,v2,...` or `name=start:end:step` entries into candidate
 * lists, keeping the order names first appear.
 */
export const parseParameterRanges = (
  entries: ReadonlyArray<string>,
): Map<string, ParameterValue[]> => {
  const ranges = new Map<string, ParameterValue[]>();
  for (const entry of entries) {
    const [name, text] = splitAssignment(entry);
    const match = RANGE_PATTERN.exec(text);
    const values = match
      ? expandRange({ start: Number(match[1]), end: Number(match[2]), step: Number(match[3]) })
      : text
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
          .map(parseParameterValue);
    if (values.length === 0) {
      throw new InvalidArgumentError(`Range for "${name}" has no values.`);
    }
    ranges.set(name, values);
  }
  return ranges;
};

/** Commander collector for repeatable options. */
export const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const parseStrategyKind = (value: string): StrategyKind => {
  if (!isStrategyKind(value)) {
    throw new InvalidArgumentError(`Unknown strategy. Expected one of: ${STRATEGY_KINDS.join(", ")}.`);
  }
  return value;
};

export const parsePositiveNumber = (value: string): number => {
  const parsed = Number(value);
  if (!NUMERIC_PATTERN.test(value.trim()) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
};

export const parsePositiveInteger = (value: string): number => {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

/** Comma-separated list, blanks dropped. */
export const parseList = (value: string): string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
