// Shared wire types for the HTTP API and SSE

export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
  timestamp?: string;
}

export interface ChatRequestBody {
  documentId: string;
  messages: ChatMessage[];
  requestId?: string;
}

export type AgentUsed = "generic" | "sql" | "analysis";

export interface ChatResponse {
  response: string;
  agent_used: AgentUsed;
  sql_query: string | null;
  data_analyzed: boolean;
  error: string | null;
}

export type WorkflowStateName =
  | "Init"
  | "Routed"
  | "Querying"
  | "Analyzed"
  | "QueryFailed"
  | "Done"
  | "Failed";

export interface AgentLogEvent {
  type: "agent_log";
  from: WorkflowStateName;
  to: WorkflowStateName;
  message: string;
  ts: number;
}

export interface FinalEvent extends ChatResponse {
  type: "final";
  request_id: string;
  ts: number;
}

export type SSEOutEvent = AgentLogEvent | FinalEvent;

export interface AgentInfo {
  name: string;
  description: string;
}

export interface ErrorResponse {
  error: string;
}
