// Shared by the Node.js runtime and middleware; keep free of node: imports.

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off"];

/**
 * parseFlag reads an env-style boolean. Blank or missing yields `fallback`;
 * an unrecognised value yields null so callers can decide how strict to be.
 */
export function parseFlag(value: string | undefined, fallback: boolean): boolean | null {
  const v = (value ?? "").trim().toLowerCase();
  if (v === "") return fallback;
  if (TRUE_VALUES.includes(v)) return true;
  if (FALSE_VALUES.includes(v)) return false;
  return null;
}
