import { CaveError } from "@cavern/contracts";

/**
 * Throw CONFIG_INVALID unless `value` is a number in [0, 1].
 */
export function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw CaveError.configInvalid(
      `${name} must be between 0 and 1, got ${value}`,
      { [name]: value },
    );
  }
}
