import { InvalidArgumentError } from "commander";

/**
 * Option parser for integer flags
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}
