const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/** Interpret an environment flag; anything but a recognised "true" is false. */
export function parseBoolOrFalse(v: string | undefined): boolean {
  return v !== undefined && TRUE_VALUES.has(v.trim().toLowerCase());
}
