// Request types (Gemini generateContent)

export interface GeminiPart {
  text?: string;
  thought?: boolean;
  functionCall?: { name: string; args?: Record<string, unknown> };
  functionResponse?: { name: string; response?: Record<string, unknown> };
}

export interface GeminiContent {
  role?: string;
  parts: GeminiPart[];
}

export interface GeminiFunctionDeclaration {
  name: string;
  description?: string;
  parameters?: Record<string, unknown>;
}

export interface GenerationConfig {
  maxOutputTokens?: number;
  temperature?: number;
  topP?: number;
  stopSequences?: string[];
  thinkingConfig?: {
    thinkingBudget?: number;
    includeThoughts?: boolean;
  };
}

export interface GenerateContentRequest {
  contents: GeminiContent[];
  systemInstruction?: GeminiContent;
  generationConfig?: GenerationConfig;
  tools?: Array<{ functionDeclarations?: GeminiFunctionDeclaration[] }>;
  toolConfig?: unknown;
}

/**
 * Request as seen by the builder: the body plus the model from the path
 */
export interface GeminiCall {
  model: string;
  body: GenerateContentRequest;
}

export type GeminiAction = 'generateContent' | 'streamGenerateContent';

// Response types

export interface ResponsePart {
  text?: string;
  thought?: boolean;
  functionCall?: { name: string; args: object };
}

export interface UsageMetadata {
  promptTokenCount: number;
  candidatesTokenCount: number;
  totalTokenCount: number;
  thoughtsTokenCount?: number;
}

export interface GenerateContentResponse {
  candidates: Array<{
    content: { parts: ResponsePart[]; role: 'model' };
    finishReason?: 'STOP';
    index: number;
  }>;
  usageMetadata: UsageMetadata;
  modelVersion: string;
  responseId: string;
}
