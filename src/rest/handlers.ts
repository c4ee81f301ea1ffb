// =============================================================================
// REST API — Request Handlers
// =============================================================================

import type { IncomingMessage, ServerResponse } from "node:http";
import type { z } from "zod";
import type {
  AnswerResponse,
  CorrectedTextResponse,
  HealthResponse,
  SummaryResponse,
  TranslatedTextResponse,
  UploadResponse,
} from "./types.js";
import {
  AskRequestSchema,
  ChatRequestSchema,
  CorrectGrammarRequestSchema,
  TranslateRequestSchema,
  UploadRequestSchema,
} from "./schemas.js";
import { PayloadTooLargeError, parseBody, sendError, sendJson } from "./router.js";
import type { ContentService } from "../service/content-service.js";
import type { PageBriefError } from "../errors.js";
import type { Result } from "../result.js";
import { describeError, type Logger } from "../logging/logger.js";

export const VERSION = "0.1.0";

export interface HandlerContext {
  service: ContentService;
  logger: Logger;
  maxBodyBytes: number;
}

type Handler = (req: IncomingMessage, res: ServerResponse, params: Record<string, string>) => Promise<void>;

// ---------------------------------------------------------------------------
// Shared plumbing
// ---------------------------------------------------------------------------

export function statusFor(error: PageBriefError): number {
  switch (error.code) {
    case "VALIDATION_ERROR":
      return 400;
    case "NOT_FOUND":
      return 404;
    default:
      return 500;
  }
}

/** Client errors keep their message; everything else is reported generically. */
function sendFailure(res: ServerResponse, error: PageBriefError, ctx: HandlerContext): void {
  const status = statusFor(error);
  if (status >= 500) {
    ctx.logger.error("request:failed", { status, code: error.code, ...describeError(error) });
    sendError(res, status, "Internal server error");
    return;
  }
  sendError(res, status, error.message);
}

/** Parses and validates a JSON body. Sends a 4xx and resolves to null on failure. */
async function readJson<T>(
  req: IncomingMessage,
  res: ServerResponse,
  schema: z.ZodType<T>,
  ctx: HandlerContext,
): Promise<T | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await parseBody(req, ctx.maxBodyBytes));
  } catch (err) {
    if (err instanceof PayloadTooLargeError) {
      sendError(res, 413, err.message);
    } else {
      sendError(res, 400, "Invalid JSON body");
    }
    return null;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "body";
    sendError(res, 400, `Invalid field "${field}": ${issue?.message ?? "invalid value"}`);
    return null;
  }
  return parsed.data;
}

function respond<T>(
  res: ServerResponse,
  result: Result<T>,
  ctx: HandlerContext,
  toBody: (data: T) => unknown,
): void {
  if (result.success) {
    sendJson(res, 200, toBody(result.data));
  } else {
    sendFailure(res, result.error, ctx);
  }
}

// ---------------------------------------------------------------------------
// GET /health
// ---------------------------------------------------------------------------

export function handleHealth(
  _req: IncomingMessage,
  res: ServerResponse,
): void {
  const body: HealthResponse = { status: "ok", version: VERSION };
  sendJson(res, 200, body);
}

// ---------------------------------------------------------------------------
// POST /upload_html/
// ---------------------------------------------------------------------------

export function handleUpload(ctx: HandlerContext): Handler {
  return async (req, res) => {
    const body = await readJson(req, res, UploadRequestSchema, ctx);
    if (!body) return;

    const result = await ctx.service.upload(body.html);
    respond(res, result, ctx, (token): UploadResponse => ({ message: "HTML stored", token }));
  };
}

// ---------------------------------------------------------------------------
// GET /get_summary/:token
// ---------------------------------------------------------------------------

export function handleSummary(ctx: HandlerContext): Handler {
  return async (_req, res, params) => {
    const token = params.token;
    const result = await ctx.service.summarize(token);
    respond(res, result, ctx, (summary): SummaryResponse => ({ token, summary }));
  };
}

// ---------------------------------------------------------------------------
// POST /ask/
// ---------------------------------------------------------------------------

export function handleAsk(ctx: HandlerContext): Handler {
  return async (req, res) => {
    const body = await readJson(req, res, AskRequestSchema, ctx);
    if (!body) return;

    const result = await ctx.service.ask(body.token, body.question);
    respond(res, result, ctx, (answer): AnswerResponse => ({ answer }));
  };
}

// ---------------------------------------------------------------------------
// POST /correct-grammar/
// ---------------------------------------------------------------------------

export function handleCorrectGrammar(ctx: HandlerContext): Handler {
  return async (req, res) => {
    const body = await readJson(req, res, CorrectGrammarRequestSchema, ctx);
    if (!body) return;

    const result = await ctx.service.correctGrammar(body.text);
    respond(res, result, ctx, (corrected): CorrectedTextResponse => ({ corrected_text: corrected }));
  };
}

// ---------------------------------------------------------------------------
// POST /translate/
// ---------------------------------------------------------------------------

export function handleTranslate(ctx: HandlerContext): Handler {
  return async (req, res) => {
    const body = await readJson(req, res, TranslateRequestSchema, ctx);
    if (!body) return;

    const result = await ctx.service.translate(body.text, body.targetLang);
    respond(res, result, ctx, (translated): TranslatedTextResponse => ({ translated_text: translated }));
  };
}

// ---------------------------------------------------------------------------
// POST /chat_about_content/
// ---------------------------------------------------------------------------

export function handleChat(ctx: HandlerContext): Handler {
  return async (req, res) => {
    const body = await readJson(req, res, ChatRequestSchema, ctx);
    if (!body) return;

    const result = await ctx.service.chat(body.question, body.selectedContent);
    respond(res, result, ctx, (answer): AnswerResponse => ({ answer }));
  };
}
