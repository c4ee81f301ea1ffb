// =============================================================================
// pagebrief/rest — HTTP surface
// =============================================================================

export { PageBriefServer } from "./server.js";
export { Router, PayloadTooLargeError } from "./router.js";
export { statusFor, VERSION } from "./handlers.js";
export type {
  ServerOptions,
  UploadResponse,
  SummaryResponse,
  AnswerResponse,
  CorrectedTextResponse,
  TranslatedTextResponse,
  ErrorResponse,
  HealthResponse,
} from "./types.js";
export type {
  UploadRequest,
  AskRequest,
  CorrectGrammarRequest,
  TranslateRequest,
  ChatRequest,
} from "./schemas.js";
