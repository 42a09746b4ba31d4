import { existsSync } from "node:fs";
import { posix } from "node:path";

/** Longest run of encoded parts that may fold into one directory name. */
const MAX_JOINED_PARTS = 5;
const JOINERS = [".", "-"] as const;

export interface DecodedProjectPath {
  path: string;
  /**
   * True when some segment was not verified on disk or had more than one
   * existing reading. The path is then a guess.
   */
  ambiguous: boolean;
}

/**
 * The CLI's own directory naming: every `/` and `.` becomes `-`.
 * `/home/ann.lee/dev/app` -> `-home-ann-lee-dev-app`.
 */
export function encodeProjectPath(projectPath: string): string {
  return projectPath.replace(/[/.]/g, "-");
}

/**
 * Best-effort inverse of {@link encodeProjectPath}. The encoding is lossy
 * (`a-b`, `a.b` and `a/b` all become `a-b`), so the filesystem is checked to
 * pick the reading that exists. Segments are resolved greedily from the root.
 */
export function decodeProjectPath(
  encoded: string,
  exists: (path: string) => boolean = existsSync,
): DecodedProjectPath {
  const parts = encoded.replace(/^-/, "").split("-");
  if (parts.length === 1 && parts[0] === "") {
    return { path: "/", ambiguous: false };
  }

  let current = "/";
  let ambiguous = false;
  let i = 0;

  while (i < parts.length) {
    const found: Array<{ name: string; next: number }> = [];

    const limit = Math.min(i + MAX_JOINED_PARTS, parts.length);
    for (let j = i + 1; j <= limit; j++) {
      const slice = parts.slice(i, j);
      const names =
        slice.length === 1 ? [slice[0]] : JOINERS.map((sep) => slice.join(sep));
      for (const name of names) {
        if (name === "" || found.some((f) => f.name === name)) continue;
        if (exists(posix.join(current, name))) {
          found.push({ name, next: j });
        }
      }
    }

    if (found.length > 0) {
      if (found.length > 1) ambiguous = true;
      current = posix.join(current, found[0].name);
      i = found[0].next;
      continue;
    }

    // Nothing on disk: an empty part stands for a dot-prefixed name.
    ambiguous = true;
    if (parts[i] === "" && i + 1 < parts.length) {
      current = posix.join(current, "." + parts[i + 1]);
      i += 2;
    } else {
      current = posix.join(current, parts[i]);
      i += 1;
    }
  }

  return { path: current, ambiguous };
}
