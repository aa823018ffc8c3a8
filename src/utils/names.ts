/**
 * Name helpers shared by the synthesizers and renderers
 */

/**
 * Reserve `base` in `claimed`, appending 2, 3, ... until the name is free
 */
export function claimName(base: string, claimed: Set<string>): string {
  let candidate = base;
  let counter = 2;
  while (claimed.has(candidate)) {
    candidate = `${base}${counter}`;
    counter++;
  }
  claimed.add(candidate);
  return candidate;
}

/**
 * Whether a URL carries its own scheme (and so can be requested as-is)
 */
export function hasScheme(url: string): boolean {
  return /^[A-Za-z][A-Za-z0-9+.-]*:/.test(url);
}
