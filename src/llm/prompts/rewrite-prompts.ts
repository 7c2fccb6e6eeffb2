import { RewriteStyle } from "../../types";

export const DEFAULT_REWRITE_STYLE: RewriteStyle = "professional";

export const BASE_REWRITE_SYSTEM_PROMPT =
  "You are an assistant that rewrites user text into natural, native English while preserving meaning. " +
  "You fix grammar, clarity, and tone according to the requested style. " +
  "Do not add new information. If text is already natural, return it with minimal edits.";

export const STYLE_INSTRUCTIONS: Record<RewriteStyle, string> = {
  professional: "Use a polished, formal tone. Be clear and concise.",
  casual: "Use a friendly, conversational tone without slang.",
  concise: "Be brief and to the point. Remove unnecessary words.",
  friendly: "Be warm and encouraging while remaining professional.",
};

export function resolveRewriteStyle(
  rawStyle: string | undefined | null
): RewriteStyle {
  const normalized =
    typeof rawStyle === "string" ? rawStyle.trim().toLowerCase() : "";
  if (normalized === "professional") return "professional";
  if (normalized === "casual") return "casual";
  if (normalized === "concise") return "concise";
  if (normalized === "friendly") return "friendly";
  return DEFAULT_REWRITE_STYLE;
}

export function buildRewriteSystemPrompt(
  style: RewriteStyle,
  extraInstructions?: string
): string {
  const extra = extraInstructions?.trim();
  const styleInstruction =
    STYLE_INSTRUCTIONS[style] + (extra ? ` ${extra}` : "");
  return `${BASE_REWRITE_SYSTEM_PROMPT} Style: ${styleInstruction}`;
}

export function buildRewriteUserPrompt(text: string): string {
  return `Rewrite the following text. Output only the rewritten text, no explanations.

Text: ${text}`;
}
