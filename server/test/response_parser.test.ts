import { describe, expect, it } from "vitest";
import {
  formatDiplomaticResponse,
  formatNormalizationResponse,
  parseDiplomaticResponse,
  parseNormalizationResponse
} from "../src/pipeline/response_parser.js";

const META = {
  confidence: "high",
  handwriting_present: true,
  typewriting_present: false,
  layout_notes: "two columns",
  problems: []
};

function diplomatic(transcription: string, meta: unknown = META): string {
  return `=== TRANSCRIPTION ===\n${transcription}\n=== META ===\n${JSON.stringify(meta)}\n`;
}

describe("pipeline/response_parser", () => {
  describe("parseDiplomaticResponse", () => {
    it("parses the two sections, keeping inner whitespace of the transcription", () => {
      const parsed = parseDiplomaticResponse(diplomatic("Első sor\n\n  második [?] sor"));
      expect(parsed).toEqual({
        ok: true,
        value: { transcription: "Első sor\n\n  második [?] sor", meta: META }
      });
    });

    it("accepts CRLF line endings and a fenced META block", () => {
      const raw = "=== TRANSCRIPTION ===\r\nszöveg\r\n=== META ===\r\n```json\r\n" + JSON.stringify(META) + "\r\n```\r\n";
      const parsed = parseDiplomaticResponse(raw);
      expect(parsed.ok).toBe(true);
      if (parsed.ok) expect(parsed.value.transcription).toBe("szöveg");
    });

    it("keeps unknown META keys", () => {
      const parsed = parseDiplomaticResponse(diplomatic("x", { ...META, page: 3 }));
      expect(parsed.ok && parsed.value.meta).toMatchObject({ page: 3, confidence: "high" });
    });

    it("rejects missing or reordered sections", () => {
      expect(parseDiplomaticResponse("just text")).toEqual({ ok: false, error: "Expected sections TRANSCRIPTION, META; found none" });
      expect(parseDiplomaticResponse(`=== META ===\n{}\n=== TRANSCRIPTION ===\nx\n`)).toEqual({
        ok: false,
        error: "Expected sections TRANSCRIPTION, META; found META, TRANSCRIPTION"
      });
    });

    it("rejects text before the first header", () => {
      expect(parseDiplomaticResponse(`Sure! Here it is.\n${diplomatic("x")}`)).toEqual({
        ok: false,
        error: "Unexpected text before the first section header"
      });
    });

    it("rejects an empty transcription", () => {
      expect(parseDiplomaticResponse(diplomatic("   "))).toEqual({ ok: false, error: "TRANSCRIPTION section is empty" });
    });

    it("rejects invalid META JSON and schema violations", () => {
      const bad = parseDiplomaticResponse("=== TRANSCRIPTION ===\nx\n=== META ===\n{not json}\n");
      expect(bad.ok).toBe(false);
      if (!bad.ok) expect(bad.error.startsWith("META is not valid JSON: ")).toBe(true);

      const invalid = parseDiplomaticResponse(diplomatic("x", { ...META, confidence: "certain" }));
      expect(invalid.ok).toBe(false);
      if (!invalid.ok) expect(invalid.error.startsWith("META failed validation: confidence: ")).toBe(true);

      expect(parseDiplomaticResponse("=== TRANSCRIPTION ===\nx\n=== META ===\n\n")).toEqual({ ok: false, error: "META section is empty" });
    });

    it("parses what formatDiplomaticResponse produces", () => {
      const response = { transcription: "a\nb", meta: { ...META, confidence: "low" as const } };
      expect(parseDiplomaticResponse(formatDiplomaticResponse(response))).toEqual({ ok: true, value: response });
    });
  });

  describe("parseNormalizationResponse", () => {
    const editLog = [{ type: "correction", from: "teh", to: "the", reason: "typo" }];
    const meta = { total_changes: 1, total_flags: 0, notes: "" };

    it("parses the three sections", () => {
      const raw = `=== CORRECTED_TEXT ===\nthe text\n=== EDIT_LOG ===\n${JSON.stringify(editLog)}\n=== META ===\n${JSON.stringify(meta)}\n`;
      expect(parseNormalizationResponse(raw)).toEqual({ ok: true, value: { correctedText: "the text", editLog, meta } });
    });

    it("rejects edit entries with an unknown type", () => {
      const raw = `=== CORRECTED_TEXT ===\nx\n=== EDIT_LOG ===\n[{"type":"rewrite","from":"a","to":"b","reason":"r"}]\n=== META ===\n${JSON.stringify(meta)}\n`;
      const parsed = parseNormalizationResponse(raw);
      expect(parsed.ok).toBe(false);
      if (!parsed.ok) expect(parsed.error.startsWith("EDIT_LOG failed validation: 0.type: ")).toBe(true);
    });

    it("rejects negative counts in META", () => {
      const raw = `=== CORRECTED_TEXT ===\nx\n=== EDIT_LOG ===\n[]\n=== META ===\n{"total_changes":-1,"total_flags":0,"notes":""}\n`;
      const parsed = parseNormalizationResponse(raw);
      expect(parsed.ok).toBe(false);
      if (!parsed.ok) expect(parsed.error.startsWith("META failed validation: total_changes: ")).toBe(true);
    });

    it("does not mistake page markers inside the text for section headers", () => {
      const text = "=== SOURCE: DOC_001 ===\n\n=== PAGE 1 ===\nelső\n\n=== PAGE 2 ===\nmásodik";
      const parsed = parseNormalizationResponse(formatNormalizationResponse({ correctedText: text, editLog: [], meta }));
      expect(parsed.ok && parsed.value.correctedText).toBe(text);
    });

    it("rejects an empty corrected text", () => {
      const raw = `=== CORRECTED_TEXT ===\n\n=== EDIT_LOG ===\n[]\n=== META ===\n${JSON.stringify(meta)}\n`;
      expect(parseNormalizationResponse(raw)).toEqual({ ok: false, error: "CORRECTED_TEXT section is empty" });
    });
  });
});
