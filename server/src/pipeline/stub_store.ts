import fs from "node:fs/promises";
import path from "node:path";
import type { Phase } from "../state_store.js";
import { formatDiplomaticResponse, formatNormalizationResponse } from "./response_parser.js";
import { writeJsonFile, writeRawTextFile } from "./utils.js";

export type StubOrigin = "generated" | "recorded";

export type StubKey = {
  sourceId: string;
  /** Page id (`<source>_p001`) or, for whole-document normalization, the source id. */
  unitId: string;
  phase: Phase;
};

export type StubProvenance = {
  source_id: string;
  unit_id: string;
  phase: Phase;
  origin: StubOrigin;
  model?: string;
  recorded_at?: string;
};

export type StubRequest =
  | { phase: "diplomatic"; sourceId: string; unitId: string; page: number }
  | { phase: "normalization"; sourceId: string; unitId: string; inputText: string };

export const GENERATED_STUB_PROBLEM = "stub_no_model_call";

export class StubNotFoundError extends Error {
  key: StubKey;
  constructor(key: StubKey) {
    super(`No ${key.phase} stub recorded for ${key.unitId}`);
    this.name = "StubNotFoundError";
    this.key = key;
  }
}

export interface StubStore {
  write(key: StubKey, payload: string, provenance: StubProvenance): Promise<void>;
  read(key: StubKey): Promise<string>;
  generate(request: StubRequest): string;
}

/**
 * Deterministic stand-in response in the same sectioned format a model returns, so the
 * parser and state machine run exactly as they would on a live call.
 */
export function generateStubPayload(request: StubRequest): string {
  if (request.phase === "diplomatic") {
    return formatDiplomaticResponse({
      transcription: `<type>[STUB]</type> ${request.sourceId} page ${request.page}`,
      meta: {
        source_id: request.sourceId,
        page: request.page,
        page_id: request.unitId,
        confidence: "medium",
        handwriting_present: false,
        typewriting_present: true,
        layout_notes: "generated stub",
        problems: [GENERATED_STUB_PROBLEM]
      }
    });
  }

  return formatNormalizationResponse({
    correctedText: request.inputText,
    editLog: [],
    meta: {
      source_id: request.sourceId,
      model_id: "stub",
      total_changes: 0,
      total_flags: 0,
      notes: "stub/no-api"
    }
  });
}

export class FileStubStore implements StubStore {
  constructor(private readonly root: string) {}

  payloadPath(key: StubKey): string {
    return path.join(this.root, key.phase, `${key.unitId}.out.txt`);
  }

  provenancePath(key: StubKey): string {
    return path.join(this.root, key.phase, `${key.unitId}.stub.json`);
  }

  async write(key: StubKey, payload: string, provenance: StubProvenance): Promise<void> {
    await writeRawTextFile(this.payloadPath(key), payload);
    await writeJsonFile(this.provenancePath(key), provenance);
  }

  async read(key: StubKey): Promise<string> {
    try {
      return await fs.readFile(this.payloadPath(key), "utf8");
    } catch (err) {
      if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") throw new StubNotFoundError(key);
      throw err;
    }
  }

  generate(request: StubRequest): string {
    return generateStubPayload(request);
  }
}
