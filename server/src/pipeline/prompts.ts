import fs from "node:fs/promises";
import path from "node:path";
import { ConfigurationError } from "../config.js";

export const DIPLOMATIC_PROMPT_FILE = "diplomatic_transcription_prompt.md";
export const NORMALIZATION_PROMPT_FILE = "normalization_prompt.md";

export type PromptAssets = {
  diplomatic: string;
  normalization: string;
};

async function readPromptOrThrow(filePath: string): Promise<string> {
  try {
    const text = await fs.readFile(filePath, "utf8");
    if (text.trim().length === 0) throw new ConfigurationError(`Prompt file is empty: ${filePath}`);
    return text;
  } catch (err) {
    if (err instanceof ConfigurationError) throw err;
    throw new ConfigurationError(`Missing prompt file: ${filePath}`);
  }
}

/** Both prompts are read verbatim once, before any page work starts. */
export async function loadPromptAssets(promptsDir: string): Promise<PromptAssets> {
  return {
    diplomatic: await readPromptOrThrow(path.join(promptsDir, DIPLOMATIC_PROMPT_FILE)),
    normalization: await readPromptOrThrow(path.join(promptsDir, NORMALIZATION_PROMPT_FILE))
  };
}

export function buildDiplomaticUserPrompt(args: { language: string; sourceId: string; page: number; pageId: string }): string {
  return [
    `Language: ${args.language}`,
    `source_id: ${args.sourceId}`,
    `page: ${args.page}`,
    `page_id: ${args.pageId}`,
    "",
    "Task: Produce a diplomatic transcription of this page image.",
    "Do not translate. Use the required output block headers and JSON schema.",
    ""
  ].join("\n");
}

export function buildNormalizationUserPrompt(args: { language: string; sourceId: string; unitLabel: string; text: string }): string {
  return [
    `Language: ${args.language}`,
    `source_id: ${args.sourceId}`,
    `unit: ${args.unitLabel}`,
    "",
    "Task:",
    "1) Produce corrected/normalized transcription (v2) following rules.",
    "2) Produce EDIT_LOG JSON array.",
    "3) Produce META.",
    "",
    "INPUT (v1):",
    args.text,
    ""
  ].join("\n");
}
