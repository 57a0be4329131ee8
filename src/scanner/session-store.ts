/**
 * Finds session JSONL files under the projects directory (one subdirectory
 * per project) and returns them newest first
 */

import { createReadStream, promises as fs, type Dirent } from 'fs';
import { basename, join, sep } from 'path';
import { createInterface } from 'readline';
import { NotFoundError, isErrnoException } from '../errors.js';
import { createLogger } from '../logger.js';
import { SELF_AUDIT_PREFIXES } from '../analyzer/prompts.js';
import { isRecord } from '../util.js';
import type { SessionDescriptor } from '../types/session.js';

const SUBAGENT_DIR = 'subagents';
const TRANSCRIPT_EXT = '.jsonl';

const log = createLogger('scanner');

export interface ScanOptions {
  /** Sessions whose first user message starts with one of these are skipped */
  selfAuditPrefixes?: readonly string[];
}

export async function listSessions(
  projectsDir: string,
  options: ScanOptions = {},
): Promise<SessionDescriptor[]> {
  const prefixes = options.selfAuditPrefixes ?? SELF_AUDIT_PREFIXES;
  const files = await findTranscriptFiles(projectsDir);
  const entries: SessionDescriptor[] = [];

  for (const filePath of files) {
    if (isSubagentPath(projectsDir, filePath)) continue;

    let modifiedAt: number;
    try {
      modifiedAt = (await fs.stat(filePath)).mtimeMs;
    } catch (err) {
      // Deleted between readdir and stat
      log.debug(`Skipping ${filePath}: ${isErrnoException(err) ? err.code : String(err)}`);
      continue;
    }

    if (await isSelfAuditSession(filePath, prefixes)) {
      log.debug(`Skipping self-audit session ${filePath}`);
      continue;
    }

    entries.push({
      id: basename(filePath, TRANSCRIPT_EXT),
      path: filePath,
      project: basename(join(filePath, '..')),
      modifiedAt,
    });
  }

  entries.sort((a, b) => b.modifiedAt - a.modifiedAt);
  return entries;
}

/**
 * The most recently modified session
 */
export async function findLatestSession(
  projectsDir: string,
  options?: ScanOptions,
): Promise<SessionDescriptor> {
  const [latest] = await listSessions(projectsDir, options);
  if (!latest) {
    throw new NotFoundError(`No sessions found in ${projectsDir}`);
  }
  return latest;
}

/**
 * Find a session by its full ID or a unique-enough prefix (newest match wins)
 */
export async function findSession(
  projectsDir: string,
  sessionId: string,
  options?: ScanOptions,
): Promise<SessionDescriptor> {
  const sessions = await listSessions(projectsDir, options);
  const match =
    sessions.find(s => s.id === sessionId) ?? sessions.find(s => s.id.startsWith(sessionId));
  if (!match) {
    throw new NotFoundError(`No session matching "${sessionId}" in ${projectsDir}`);
  }
  return match;
}

async function findTranscriptFiles(dir: string): Promise<string[]> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return [];
    }
    throw err;
  }

  const files: string[] = [];
  for (const dirent of dirents) {
    const fullPath = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      files.push(...(await findTranscriptFiles(fullPath)));
    } else if (dirent.isFile() && dirent.name.endsWith(TRANSCRIPT_EXT)) {
      files.push(fullPath);
    }
  }
  return files;
}

function isSubagentPath(root: string, filePath: string): boolean {
  const relative = filePath.startsWith(root) ? filePath.slice(root.length) : filePath;
  return relative.split(sep).includes(SUBAGENT_DIR);
}

/**
 * Checks whether the first user message of a transcript is one of our own
 * prompts, i.e. the session was created by an ai-lint model call
 */
export async function isSelfAuditSession(
  filePath: string,
  prefixes: readonly string[] = SELF_AUDIT_PREFIXES,
): Promise<boolean> {
  const rl = createInterface({
    input: createReadStream(filePath),
    crlfDelay: Infinity,
  });

  try {
    for await (const line of rl) {
      if (!line.trim()) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        continue;
      }
      if (!isRecord(raw) || raw.type !== 'user') continue;

      const text = firstText(isRecord(raw.message) ? raw.message.content : undefined);
      return text !== null && prefixes.some(prefix => text.startsWith(prefix));
    }
  } catch (err) {
    log.debug(`Could not read ${filePath}: ${isErrnoException(err) ? err.code : String(err)}`);
  } finally {
    rl.close();
  }
  return false;
}

function firstText(content: unknown): string | null {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) {
    for (const block of content) {
      if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
        return block.text;
      }
    }
  }
  return null;
}
