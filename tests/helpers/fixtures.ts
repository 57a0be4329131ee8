import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { SessionDescriptor } from '../../src/types/session.js';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), 'ai-lint-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Build a JSONL line in the Claude Code transcript format */
export function line(obj: Record<string, unknown>): string {
  return JSON.stringify(obj);
}

export function userLine(
  content: unknown,
  opts: Partial<{ timestamp: string; cwd: string; isSidechain: boolean }> = {},
): string {
  return line({
    type: 'user',
    sessionId: 'test-session',
    timestamp: opts.timestamp ?? '2026-02-20T10:00:00.000Z',
    ...(opts.cwd ? { cwd: opts.cwd } : {}),
    ...(opts.isSidechain ? { isSidechain: true } : {}),
    message: { role: 'user', content },
  });
}

export function assistantLine(
  content: unknown,
  opts: Partial<{ timestamp: string }> = {},
): string {
  return line({
    type: 'assistant',
    sessionId: 'test-session',
    timestamp: opts.timestamp ?? '2026-02-20T10:00:01.000Z',
    message: { role: 'assistant', content },
  });
}

export function summaryLine(summary: string): string {
  return line({ type: 'summary', summary });
}

/**
 * Write a transcript under root/project/name and set its mtime (seconds)
 */
export async function writeTranscript(
  root: string,
  relativePath: string,
  lines: string[],
  mtimeSeconds?: number,
): Promise<string> {
  const filePath = join(root, relativePath);
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, lines.length > 0 ? lines.join('\n') + '\n' : '', 'utf-8');
  if (mtimeSeconds !== undefined) {
    await fs.utimes(filePath, mtimeSeconds, mtimeSeconds);
  }
  return filePath;
}

export function descriptorFor(filePath: string, id = 'session-1', project = 'project-a'): SessionDescriptor {
  return { id, path: filePath, project, modifiedAt: 0 };
}
