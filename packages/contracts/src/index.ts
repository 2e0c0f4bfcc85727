export type ToolInput =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "list"; items: ToolInput[] }
  | { kind: "map"; entries: ToolInputEntry[] };

export interface ToolInputEntry {
  key: string;
  value: ToolInput;
}

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "thinking"; thinking: string }
  | { type: "tool_use"; id: string; name: string; input: ToolInput }
  | { type: "tool_result"; toolUseId: string; text: string; isError: boolean }
  | { type: "other"; rawType: string };

export interface Message {
  type: string;
  content: ContentBlock[];
  agentId: string;
  sessionId: string;
  uuid: string;
  timestamp: string;
  timestampMs: number | null;
}

export interface Session {
  readonly id: string;
  readonly path: string;
  readonly parentId: string;
  readonly isSubagent: boolean;
  readonly messages: readonly Message[];
  readonly offset: number;
  readonly lastUpdate: number;
}

export interface SessionNode {
  sessionId: string;
  session: Session;
  children: SessionNode[];
  expanded: boolean;
}

export interface FlatTreeRow {
  sessionId: string;
  session: Session;
  depth: number;
  hasChildren: boolean;
  isLast: boolean;
}

export interface SessionFileEvent {
  path: string;
  sessionId: string;
  isSubagent: boolean;
  parentId: string;
}

export interface DecodeResult {
  messages: Message[];
  newOffset: number;
}

export type MessageDecoder = (path: string, fromOffset: number) => Promise<DecodeResult>;

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";
export type ViewMode = "panel" | "tree";

export interface PanelsConfig {
  count: number;
  excludePatterns: string[];
}

export interface WatchConfig {
  claudeHome: string;
  debounceMs: number;
}

export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
}

export interface AppConfig {
  panels: PanelsConfig;
  watch: WatchConfig;
  log: LogConfig;
}

export interface SessionSummary {
  id: string;
  path: string;
  parentId: string;
  isSubagent: boolean;
  offset: number;
  lastUpdate: number;
  messageCount: number;
}

export interface StreamEnvelope {
  id: string;
  type: "snapshot" | "session_added" | "messages_appended" | "slots_changed" | "heartbeat";
  version: number;
  payload: Record<string, unknown>;
}
