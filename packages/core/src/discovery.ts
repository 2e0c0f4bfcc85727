import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { SessionFileEvent } from "@sessionpane/contracts";

export const SESSION_FILE_EXTENSION = ".jsonl";
export const SUBAGENT_DIRECTORY = "subagents";

export type SessionPathInfo = Omit<SessionFileEvent, "path">;

export interface DiscoveredSessionFile extends SessionFileEvent {
  sizeBytes: number;
  mtimeMs: number;
}

/**
 * Maps a log file under a project directory to its session identity:
 * `<root>/<sid>.jsonl` is a main session and `<root>/<sid>/subagents/<agent>.jsonl` a sub-agent
 * of `sid`. Any other layout is not a session file.
 */
export function classifySessionPath(root: string, filePath: string): SessionPathInfo | null {
  const relative = path.relative(path.resolve(root), path.resolve(filePath));
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) return null;
  if (!relative.endsWith(SESSION_FILE_EXTENSION)) return null;

  const parts = relative.split(path.sep);
  if (parts.length === 1) {
    const sessionId = path.basename(relative, SESSION_FILE_EXTENSION);
    return sessionId ? { sessionId, isSubagent: false, parentId: "" } : null;
  }

  const [parentId, directory, fileName] = parts;
  if (parts.length !== 3 || !parentId || directory !== SUBAGENT_DIRECTORY || !fileName) return null;
  const agentName = path.basename(fileName, SESSION_FILE_EXTENSION);
  if (!agentName) return null;
  return { sessionId: `${parentId}/${agentName}`, isSubagent: true, parentId };
}

/** Session files already on disk, oldest first so the newest sessions are created last. */
export async function scanExisting(root: string): Promise<DiscoveredSessionFile[]> {
  const resolvedRoot = path.resolve(root);
  const matches = await fg([`*${SESSION_FILE_EXTENSION}`, `*/${SUBAGENT_DIRECTORY}/*${SESSION_FILE_EXTENSION}`], {
    cwd: resolvedRoot,
    absolute: true,
    onlyFiles: true,
    dot: true,
    suppressErrors: true,
    unique: true,
    followSymbolicLinks: false,
  });

  const files: DiscoveredSessionFile[] = [];
  for (const match of matches) {
    const filePath = path.resolve(match);
    const info = classifySessionPath(resolvedRoot, filePath);
    if (!info) continue;
    try {
      const fileStat = await stat(filePath);
      files.push({ path: filePath, ...info, sizeBytes: fileStat.size, mtimeMs: fileStat.mtimeMs });
    } catch {
      // removed between glob and stat
    }
  }

  return files.sort((a, b) => a.mtimeMs - b.mtimeMs || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
