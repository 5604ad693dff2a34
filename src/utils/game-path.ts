/**
 * Logical game paths: lower-case, forward slashes, no empty segments.
 * Every lookup into an archive or directory tree goes through normalizeGamePath.
 */

export function normalizeGamePath(path: string): string {
  return path
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".")
    .join("/")
    .toLowerCase();
}

/** Normalized directory with a trailing slash, or "" for the root */
export function normalizeGameDir(dir: string): string {
  const normalized = normalizeGamePath(dir);
  return normalized ? `${normalized}/` : "";
}

export function gameDirname(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? "" : path.slice(0, idx + 1);
}

export function gameBasename(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}
