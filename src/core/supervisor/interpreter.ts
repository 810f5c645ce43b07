import { EnvironmentMissingError } from "../errors.js";
import type { PlatformCapabilities } from "../platform/index.js";

export const DEFAULT_INTERPRETERS = ["python3", "python"];

export function resolveInterpreter(
  candidates: readonly string[],
  platform: Pick<PlatformCapabilities, "hasBinary">
): string {
  for (const candidate of candidates) {
    if (platform.hasBinary(candidate)) return candidate;
  }
  const tried = candidates.length > 0 ? candidates.join(", ") : "none configured";
  throw new EnvironmentMissingError(`Python not found (tried: ${tried}). Please install Python 3.`, {
    details: { candidates: [...candidates] }
  });
}
