import { z } from "zod";

export const CONFIDENCE_LEVELS = ["low", "medium", "high"] as const;
export const EDIT_TYPES = ["correction", "expansion", "punctuation"] as const;

export const DIPLOMATIC_SECTIONS = ["TRANSCRIPTION", "META"] as const;
export const NORMALIZATION_SECTIONS = ["CORRECTED_TEXT", "EDIT_LOG", "META"] as const;

export const ConfidenceSchema = z.enum(CONFIDENCE_LEVELS);

export const DiplomaticMetaSchema = z
  .object({
    confidence: ConfidenceSchema,
    handwriting_present: z.boolean(),
    typewriting_present: z.boolean(),
    layout_notes: z.string(),
    problems: z.array(z.string())
  })
  .passthrough();

export const EditLogEntrySchema = z
  .object({
    type: z.enum(EDIT_TYPES),
    from: z.string(),
    to: z.string(),
    reason: z.string()
  })
  .passthrough();

export const EditLogSchema = z.array(EditLogEntrySchema);

export const NormalizationMetaSchema = z
  .object({
    total_changes: z.number().int().min(0),
    total_flags: z.number().int().min(0),
    notes: z.string()
  })
  .passthrough();

export type Confidence = z.infer<typeof ConfidenceSchema>;
export type DiplomaticMeta = z.infer<typeof DiplomaticMetaSchema>;
export type EditLogEntry = z.infer<typeof EditLogEntrySchema>;
export type NormalizationMeta = z.infer<typeof NormalizationMetaSchema>;

export type DiplomaticResponse = {
  transcription: string;
  meta: DiplomaticMeta;
};

export type NormalizationResponse = {
  correctedText: string;
  editLog: EditLogEntry[];
  meta: NormalizationMeta;
};

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const SECTION_HEADER_RE = /^=== ([A-Z_]+) ===[ \t]*$/gm;
const JSON_FENCE_RE = /^```(?:json)?\n([\s\S]*)\n```$/;

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

function splitSections(raw: string, expected: readonly string[]): ParseResult<string[]> {
  const text = raw.replace(/\r\n/g, "\n");
  const headers = [...text.matchAll(SECTION_HEADER_RE)];
  const names = headers.map((h) => h[1]);

  if (names.join(",") !== expected.join(",")) {
    const found = names.length > 0 ? names.join(", ") : "none";
    return fail(`Expected sections ${expected.join(", ")}; found ${found}`);
  }

  const firstIndex = headers[0]?.index ?? 0;
  if (text.slice(0, firstIndex).trim().length > 0) {
    return fail("Unexpected text before the first section header");
  }

  const bodies = headers.map((header, i) => {
    const start = (header.index ?? 0) + header[0].length;
    const end = headers[i + 1]?.index ?? text.length;
    return text.slice(start, end);
  });
  return { ok: true, value: bodies };
}

function trimNewlines(body: string): string {
  return body.replace(/^\n+|\n+$/g, "");
}

function parseJsonBlock(section: string, body: string): ParseResult<unknown> {
  const trimmed = body.trim();
  const fenced = JSON_FENCE_RE.exec(trimmed);
  const jsonText = fenced ? fenced[1] : trimmed;
  if (jsonText.length === 0) return fail(`${section} section is empty`);
  try {
    return { ok: true, value: JSON.parse(jsonText) };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return fail(`${section} is not valid JSON: ${msg}`);
  }
}

function validate<T>(section: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): ParseResult<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return { ok: true, value: parsed.data };
  const details = parsed.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
  return fail(`${section} failed validation: ${details}`);
}

export function parseDiplomaticResponse(raw: string): ParseResult<DiplomaticResponse> {
  const sections = splitSections(raw, DIPLOMATIC_SECTIONS);
  if (!sections.ok) return sections;
  const [transcriptionBody, metaBody] = sections.value;

  const transcription = trimNewlines(transcriptionBody);
  if (transcription.trim().length === 0) return fail("TRANSCRIPTION section is empty");

  const metaJson = parseJsonBlock("META", metaBody);
  if (!metaJson.ok) return metaJson;
  const meta = validate("META", DiplomaticMetaSchema, metaJson.value);
  if (!meta.ok) return meta;

  return { ok: true, value: { transcription, meta: meta.value } };
}

export function parseNormalizationResponse(raw: string): ParseResult<NormalizationResponse> {
  const sections = splitSections(raw, NORMALIZATION_SECTIONS);
  if (!sections.ok) return sections;
  const [correctedBody, editLogBody, metaBody] = sections.value;

  const correctedText = trimNewlines(correctedBody);
  if (correctedText.trim().length === 0) return fail("CORRECTED_TEXT section is empty");

  const editLogJson = parseJsonBlock("EDIT_LOG", editLogBody);
  if (!editLogJson.ok) return editLogJson;
  const editLog = validate("EDIT_LOG", EditLogSchema, editLogJson.value);
  if (!editLog.ok) return editLog;

  const metaJson = parseJsonBlock("META", metaBody);
  if (!metaJson.ok) return metaJson;
  const meta = validate("META", NormalizationMetaSchema, metaJson.value);
  if (!meta.ok) return meta;

  return { ok: true, value: { correctedText, editLog: editLog.value, meta: meta.value } };
}

export function formatDiplomaticResponse(response: DiplomaticResponse): string {
  return ["=== TRANSCRIPTION ===", response.transcription, "=== META ===", JSON.stringify(response.meta, null, 2), ""].join("\n");
}

export function formatNormalizationResponse(response: NormalizationResponse): string {
  return [
    "=== CORRECTED_TEXT ===",
    response.correctedText,
    "=== EDIT_LOG ===",
    JSON.stringify(response.editLog, null, 2),
    "=== META ===",
    JSON.stringify(response.meta, null, 2),
    ""
  ].join("\n");
}
