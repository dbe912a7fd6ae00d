/**
 * Parsers for package manager listings.
 *
 * Pure functions over the captured output, so the matching rules can be
 * tested without a host package database.
 */

/** Escape a string for literal use inside a RegExp. */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function lines(output: string): string[] {
  return output.split("\n").map((line) => line.trimEnd());
}

/**
 * Check `dpkg --get-selections` output for a package in the "install" state.
 *
 * The name is anchored at the line start and must be followed by whitespace
 * (or a `:arch` qualifier), so `python3-pip` never matches
 * `python3-pip-extra`. `deinstall`, `hold` and `purge` do not count.
 */
export function hasInstalledSelection(selections: string, name: string): boolean {
  const pattern = new RegExp(`^${escapeRegExp(name)}(?::[a-z0-9-]+)?\\s+install$`);
  return lines(selections).some((line) => pattern.test(line));
}

/**
 * Check `pip3 list` output for a package with a purely numeric version.
 *
 * Accepts the legacy `name (1.2.3)` format and the columnar `name    1.2.3`
 * format. Pre-release versions, editable installs and anything else read as
 * not installed.
 */
export function hasListedPackage(listing: string, name: string): boolean {
  const escaped = escapeRegExp(name);
  const legacy = new RegExp(`^${escaped}\\s\\([0-9.]+\\)$`);
  const columns = new RegExp(`^${escaped}\\s+[0-9.]+$`);
  return lines(listing).some((line) => legacy.test(line) || columns.test(line));
}
