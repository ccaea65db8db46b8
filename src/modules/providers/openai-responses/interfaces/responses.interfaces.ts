// Request types (OpenAI Responses API)

export interface InputContentPart {
  type: string;
  text?: string;
}

/**
 * One input item: a message, or a prior tool result
 */
export interface InputItem {
  type?: string;
  role?: string;
  content?: string | InputContentPart[];
  call_id?: string;
  output?: string;
}

export interface ResponsesTool {
  type: string;
  name?: string;
  description?: string;
  parameters?: Record<string, unknown>;
}

export interface ResponsesRequest {
  model: string;
  input: string | InputItem[];
  instructions?: string | null;
  stream?: boolean;
  max_output_tokens?: number | null;
  temperature?: number | null;
  top_p?: number | null;
  tools?: ResponsesTool[];
  tool_choice?: unknown;
  store?: boolean;
  reasoning?: { effort?: string | null; summary?: string | null } | null;
  text?: { format?: { type: string }; verbosity?: string } | null;
}

// Response types

export interface OutputText {
  type: 'output_text';
  annotations: unknown[];
  logprobs: unknown[];
  text: string;
}

export type OutputItem =
  | {
      id: string;
      type: 'message';
      status: 'in_progress' | 'completed';
      content: OutputText[];
      role: 'assistant';
    }
  | {
      id: string;
      type: 'function_call';
      status: 'in_progress' | 'completed';
      name: string;
      arguments: string;
      call_id: string;
    };

export interface ResponsesUsage {
  input_tokens: number;
  input_tokens_details: { cached_tokens: number };
  output_tokens: number;
  output_tokens_details: { reasoning_tokens: number };
  total_tokens: number;
}

export interface ResponseObject {
  id: string;
  object: 'response';
  created_at: number;
  status: 'in_progress' | 'completed';
  background: boolean;
  model: string;
  output: OutputItem[];
  usage: ResponsesUsage | null;
  billing: { payer: string };
  completed_at: number | null;
  error: null;
  incomplete_details: null;
  instructions: string | null;
  max_output_tokens: number | null;
  max_tool_calls: null;
  parallel_tool_calls: boolean;
  previous_response_id: null;
  reasoning: { effort: string | null; summary: string | null };
  service_tier: string;
  store: boolean;
  temperature: number;
  text: { format: { type: string }; verbosity: string };
  tool_choice: unknown;
  tools: ResponsesTool[];
  top_p: number;
  truncation: 'disabled';
  user: null;
  metadata: Record<string, string>;
}
