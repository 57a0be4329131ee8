/**
 * Stream-parses JSONL session files into a canonical Session
 */

import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { MalformedRecordError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { isRecord, truncate } from '../util.js';
import type {
  ContentBlock,
  MessageContent,
  RawJSONLEntry,
  Role,
  Session,
  SessionDescriptor,
  ToolCall,
  ToolResult,
  Turn,
} from '../types/session.js';

export const TOOL_RESULT_CHARS = 500;
const TOOL_PARAM_CHARS = 300;
const TRUNCATION_SUFFIX = '... (truncated)';

const log = createLogger('parser');

export interface ParseOptions {
  /** Stop after this many turns */
  maxTurns?: number;
}

/**
 * Parse a JSONL session file. Damaged lines are skipped and counted, never fatal.
 */
export async function parseTranscript(
  descriptor: SessionDescriptor,
  options?: ParseOptions,
): Promise<Session> {
  const maxTurns = options?.maxTurns ?? Infinity;
  const turns: Turn[] = [];
  let cwd = '';
  let skippedLines = 0;
  let lineNumber = 0;

  const rl = createInterface({
    input: createReadStream(descriptor.path),
    crlfDelay: Infinity,
  });

  try {
    for await (const line of rl) {
      lineNumber++;
      if (!line.trim()) continue;

      try {
        const raw = parseRecord(line, lineNumber);
        if (!cwd && raw.cwd) cwd = raw.cwd;

        const turn = toTurn(raw, lineNumber);
        if (!turn) continue;

        turns.push(turn);
        if (turns.length >= maxTurns) break;
      } catch (err) {
        if (!(err instanceof MalformedRecordError)) throw err;
        skippedLines++;
        log.debug(`${descriptor.id}: ${err.message}`);
      }
    }
  } finally {
    rl.close();
  }

  if (skippedLines > 0) {
    log.debug(`${descriptor.id}: skipped ${skippedLines} malformed line(s)`);
  }

  return {
    id: descriptor.id,
    path: descriptor.path,
    project: descriptor.project,
    modifiedAt: descriptor.modifiedAt,
    cwd,
    startedAt: turns[0]?.timestamp ?? '',
    turns,
    skippedLines,
  };
}

export function parseRecord(line: string, lineNumber: number): RawJSONLEntry {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new MalformedRecordError(lineNumber, err instanceof Error ? err.message : 'invalid JSON');
  }
  if (!isRecord(raw)) {
    throw new MalformedRecordError(lineNumber, 'record is not a JSON object');
  }

  const message = isRecord(raw.message)
    ? {
        role: typeof raw.message.role === 'string' ? raw.message.role : undefined,
        content: raw.message.content,
      }
    : undefined;

  return {
    type: typeof raw.type === 'string' ? raw.type : undefined,
    timestamp: typeof raw.timestamp === 'string' ? raw.timestamp : undefined,
    cwd: typeof raw.cwd === 'string' ? raw.cwd : undefined,
    isSidechain: raw.isSidechain === true,
    message,
  };
}

/**
 * Records without a message (summaries, progress, snapshots) and sidechain
 * records produce no turn
 */
function toTurn(raw: RawJSONLEntry, lineNumber: number): Turn | null {
  if (!raw.message || raw.isSidechain) return null;

  const declaredRole = raw.message.role ?? raw.type;
  if (!declaredRole) {
    throw new MalformedRecordError(lineNumber, 'message has no role');
  }

  const content = toMessageContent(raw.message.content);
  const { text, toolCalls, toolResults } = normalizeContent(content);

  return {
    role: resolveRole(declaredRole, content),
    text,
    timestamp: raw.timestamp ?? '',
    toolCalls,
    toolResults,
  };
}

function resolveRole(declared: string, content: MessageContent): Role {
  if (
    content.kind === 'blocks' &&
    content.blocks.length > 0 &&
    content.blocks.every(b => b.type === 'tool_result')
  ) {
    return 'tool';
  }
  return declared;
}

export function toMessageContent(content: unknown): MessageContent {
  if (typeof content === 'string') return { kind: 'text', text: content };
  if (Array.isArray(content)) return { kind: 'blocks', blocks: content.map(toContentBlock) };
  if (content === null || content === undefined) return { kind: 'text', text: '' };
  return { kind: 'text', text: JSON.stringify(content) };
}

function toContentBlock(block: unknown): ContentBlock {
  if (typeof block === 'string') return { type: 'text', text: block };
  if (!isRecord(block)) return { type: 'other', originalType: typeof block };

  switch (block.type) {
    case 'text':
      return { type: 'text', text: typeof block.text === 'string' ? block.text : '' };
    case 'tool_use':
      return {
        type: 'tool_use',
        name: typeof block.name === 'string' ? block.name : 'unknown',
        input: isRecord(block.input) ? block.input : {},
      };
    case 'tool_result':
      return {
        type: 'tool_result',
        content: extractResultContent(block.content),
        isError: block.is_error === true,
      };
    default:
      return { type: 'other', originalType: String(block.type ?? 'unknown') };
  }
}

interface NormalizedContent {
  text: string;
  toolCalls: ToolCall[];
  toolResults: ToolResult[];
}

/**
 * Flatten content into one text representation, block order preserved
 */
export function normalizeContent(content: MessageContent): NormalizedContent {
  if (content.kind === 'text') {
    return { text: content.text, toolCalls: [], toolResults: [] };
  }

  const parts: string[] = [];
  const toolCalls: ToolCall[] = [];
  const toolResults: ToolResult[] = [];

  for (const block of content.blocks) {
    switch (block.type) {
      case 'text':
        if (block.text) parts.push(block.text);
        break;
      case 'tool_use': {
        const input = extractKeyParam(block.name, block.input);
        toolCalls.push({ name: block.name, input });
        parts.push(input ? `[Tool: ${block.name}] ${input}` : `[Tool: ${block.name}]`);
        break;
      }
      case 'tool_result': {
        if (!block.content) break;
        const truncated = block.content.length > TOOL_RESULT_CHARS;
        const shown = truncate(block.content, TOOL_RESULT_CHARS, TRUNCATION_SUFFIX);
        toolResults.push({ content: shown, truncated, isError: block.isError });
        parts.push(`[Tool Result] ${shown}`);
        break;
      }
      case 'other':
        // thinking, images
        break;
    }
  }

  return { text: parts.join('\n'), toolCalls, toolResults };
}

const KEY_PARAM_MAP: Record<string, string> = {
  Bash: 'command',
  Edit: 'file_path',
  Write: 'file_path',
  Read: 'file_path',
  Grep: 'pattern',
  Glob: 'pattern',
  Task: 'description',
  Skill: 'skill',
  WebSearch: 'query',
  WebFetch: 'url',
};

function extractKeyParam(toolName: string, input: Record<string, unknown>): string {
  const paramKey = KEY_PARAM_MAP[toolName];
  if (paramKey) {
    const value = input[paramKey];
    return typeof value === 'string' ? truncate(value, TOOL_PARAM_CHARS) : '';
  }

  // Unknown tool: first string value from input
  for (const val of Object.values(input)) {
    if (typeof val === 'string') {
      return truncate(val, TOOL_PARAM_CHARS);
    }
  }
  return '';
}

function extractResultContent(content: unknown): string {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) {
    return content
      .filter(isRecord)
      .filter(b => b.type === 'text' && typeof b.text === 'string')
      .map(b => String(b.text))
      .join('\n');
  }
  return '';
}

/**
 * Render a parsed session as the transcript text sent to the model
 */
export function formatTranscript(session: Session): string {
  const lines = [`# Session: ${session.id}`, `Project: ${session.project}`];
  if (session.cwd) lines.push(`Working directory: ${session.cwd}`);
  if (session.startedAt) lines.push(`Started: ${session.startedAt}`);
  lines.push(`Turns: ${session.turns.length}`, '');

  for (const turn of session.turns) {
    lines.push(`--- ${turn.role.toUpperCase()} ---`, turn.text, '');
  }

  return lines.join('\n');
}

const LABEL_MESSAGE_CHARS = 60;
const PREVIEW_TURNS = 3;

/**
 * Human-readable label for the session picker and batch reports
 */
export function sessionLabel(session: Session): string {
  const parts: string[] = [];

  if (session.startedAt) {
    const started = new Date(session.startedAt);
    parts.push(
      Number.isNaN(started.getTime())
        ? session.startedAt.slice(0, 16)
        : started.toISOString().slice(0, 16).replace('T', ' '),
    );
  }

  const project = session.project.replace(/-/g, '/').replace(/^\/+/, '');
  if (project) parts.push(project);

  const first = session.turns.find(t => t.text.trim());
  if (first) {
    const preview = truncate(first.text, LABEL_MESSAGE_CHARS).replace(/\n/g, ' ');
    parts.push(`"${preview}"`);
  }

  return parts.length > 0 ? parts.join(' | ') : session.id.slice(0, 8);
}

/**
 * Labels for a session picker. A transcript that cannot be read is labelled
 * by project and id instead of failing the whole list.
 */
export async function previewLabels(descriptors: readonly SessionDescriptor[]): Promise<string[]> {
  const parsed = await Promise.allSettled(
    descriptors.map(d => parseTranscript(d, { maxTurns: PREVIEW_TURNS })),
  );

  return parsed.map((result, i) => {
    if (result.status === 'fulfilled') return sessionLabel(result.value);
    const { project, id } = descriptors[i];
    log.debug(`${id}: cannot preview: ${errorMessage(result.reason)}`);
    return `${project} | ${id}`;
  });
}
