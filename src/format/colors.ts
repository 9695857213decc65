/**
 * Whether the CLI should emit escape sequences at all. The library itself
 * never asks; this is the front end's own decision.
 *
 * - Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * - Falls back to process.stdout.isTTY detection.
 */
export function isColorEnabled(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean | undefined = process.stdout.isTTY,
): boolean {
  if ("NO_COLOR" in env) {
    return false;
  }
  if ("FORCE_COLOR" in env) {
    return true;
  }
  return isTTY ?? false;
}
