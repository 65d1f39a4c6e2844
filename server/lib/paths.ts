import path from "path";

/** Read the navigation path (`p`) from a query string, defaulting to ".". */
export function getNavPath(query: URLSearchParams): string {
  return query.get("p") || ".";
}

/** Join and clean navigation path segments. Always POSIX, like URLs. */
export function joinNavPath(navPath: string, name: string): string {
  return path.posix.join(navPath, name);
}

/**
 * Resolve a navigation path against `root`.
 * Returns null when the result would land outside `root`.
 * E.g. ("/srv", "docs/../a.txt") → "/srv/a.txt"
 *      ("/srv", "../etc")        → null
 */
export function resolveInRoot(root: string, navPath: string): string | null {
  const resolved = path.resolve(path.join(root, navPath));
  const rel = path.relative(root, resolved);
  if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return resolved;
}

/**
 * Last non-empty component of a client-declared file name, split on both
 * separators. null when nothing usable is left.
 */
export function uploadFileName(declared: string): string | null {
  const parts = declared.split(/[\\/]+/).filter((part) => part.length > 0);
  const base = parts[parts.length - 1];
  if (!base || base === "." || base === "..") return null;
  return base;
}
