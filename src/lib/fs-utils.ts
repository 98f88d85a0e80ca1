import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  rmdirSync,
  writeFileSync,
} from "fs";
import { basename, dirname, join, relative, resolve, isAbsolute } from "path";

/** Write to a temporary sibling, then rename over the target. */
export function atomicWriteFileSync(path: string, content: string): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(path)}.${Date.now()}.${process.pid}.tmp`);
  const fd = openSync(tempPath, "w");
  try {
    writeFileSync(fd, content);
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
  renameSync(tempPath, path);
}

/** True when `child` resolves to `parent` itself or somewhere beneath it. */
export function isWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

/** True only when `child` resolves somewhere beneath `parent`, never to `parent` itself. */
export function isStrictlyWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel !== "" && isWithin(parent, child);
}

/**
 * Remove `dir` and then its ancestors while they are empty, stopping at
 * `depth` levels. Non-empty or missing directories end the walk.
 */
export function pruneEmptyDirsSync(dir: string, depth: number): void {
  let current = dir;
  for (let level = 0; level < depth; level += 1) {
    if (!existsSync(current)) return;
    try {
      rmdirSync(current);
    } catch {
      return;
    }
    current = dirname(current);
  }
}
