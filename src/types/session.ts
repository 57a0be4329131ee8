/**
 * Types for transcript records and the canonical session they parse into
 */

export interface RawJSONLEntry {
  timestamp?: string;
  type?: string;
  cwd?: string;
  message?: {
    role?: string;
    content?: unknown;
  };
  isSidechain?: boolean;
}

export type ContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; content: string; isError: boolean }
  | { type: 'other'; originalType: string };

/** Message content, discriminated once when the record is read */
export type MessageContent =
  | { kind: 'text'; text: string }
  | { kind: 'blocks'; blocks: ContentBlock[] };

// Known roles plus whatever a newer transcript producer emits
export type Role = 'user' | 'assistant' | 'tool' | (string & {});

export interface ToolCall {
  name: string;
  input: string;
}

export interface ToolResult {
  content: string;
  truncated: boolean;
  isError: boolean;
}

export interface Turn {
  role: Role;
  text: string;
  timestamp: string;
  toolCalls: ToolCall[];
  toolResults: ToolResult[];
}

export interface SessionDescriptor {
  id: string;
  path: string;
  project: string;
  modifiedAt: number;
}

export interface Session {
  id: string;
  path: string;
  project: string;
  modifiedAt: number;
  cwd: string;
  startedAt: string;
  turns: Turn[];
  skippedLines: number;
}
