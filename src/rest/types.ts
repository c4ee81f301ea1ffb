// =============================================================================
// REST API — Type Definitions
// =============================================================================

export interface ServerOptions {
  /** Port to listen on. Default: 8000 */
  port?: number;
  /** Access-Control-Allow-Origin value; empty string disables CORS. Default: "*" */
  corsOrigin?: string;
  /** Maximum accepted request body size in bytes. Default: 1 MB */
  maxBodyBytes?: number;
}

export interface UploadResponse {
  message: string;
  token: string;
}

export interface SummaryResponse {
  token: string;
  summary: string;
}

export interface AnswerResponse {
  answer: string;
}

export interface CorrectedTextResponse {
  corrected_text: string;
}

export interface TranslatedTextResponse {
  translated_text: string;
}

export interface ErrorResponse {
  error: {
    code: number;
    message: string;
  };
}

export interface HealthResponse {
  status: "ok";
  version: string;
}
