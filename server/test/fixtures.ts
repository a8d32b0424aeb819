import fs from "node:fs/promises";
import path from "node:path";
import type { ModelInvoker, ModelRequest } from "../src/pipeline/model_invoker.js";
import type { PipelineDeps } from "../src/pipeline/pipeline.js";
import { DIPLOMATIC_PROMPT_FILE, NORMALIZATION_PROMPT_FILE } from "../src/pipeline/prompts.js";
import type { PageRasterizer } from "../src/pipeline/rasterizer.js";
import { formatDiplomaticResponse, formatNormalizationResponse, type Confidence } from "../src/pipeline/response_parser.js";
import { FileStubStore } from "../src/pipeline/stub_store.js";
import { pageId, type ProjectLayout } from "../src/pipeline/utils.js";
import { RunLog } from "../src/run_log.js";
import { FileAgentStateStore } from "../src/state_store.js";

export async function writePrompts(layout: ProjectLayout): Promise<void> {
  await fs.mkdir(layout.promptsDir, { recursive: true });
  await fs.writeFile(path.join(layout.promptsDir, DIPLOMATIC_PROMPT_FILE), "Transcribe diplomatically.\n", "utf8");
  await fs.writeFile(path.join(layout.promptsDir, NORMALIZATION_PROMPT_FILE), "Normalize conservatively.\n", "utf8");
}

/** Writes one placeholder image per page instead of calling pdftoppm. */
export class FakeRasterizer implements PageRasterizer {
  calls = 0;
  constructor(private readonly pages: number) {}

  async rasterize(args: { imagesDir: string; sourceId: string }): Promise<string[]> {
    this.calls += 1;
    await fs.mkdir(args.imagesDir, { recursive: true });
    const out: string[] = [];
    for (let n = 1; n <= this.pages; n++) {
      const file = path.join(args.imagesDir, `${pageId(args.sourceId, n)}.png`);
      await fs.writeFile(file, Buffer.from([n]));
      out.push(file);
    }
    return out;
  }
}

export function pageText(page: number): string {
  return `Page ${page} text`;
}

export function diplomaticReply(page: number, confidence: Confidence = "high", transcription = pageText(page)): string {
  return formatDiplomaticResponse({
    transcription,
    meta: { confidence, handwriting_present: false, typewriting_present: true, layout_notes: "", problems: [] }
  });
}

function normalizationInput(request: ModelRequest): string {
  const marker = "INPUT (v1):\n";
  const idx = request.userText.indexOf(marker);
  return idx === -1 ? "" : request.userText.slice(idx + marker.length).replace(/\n$/, "");
}

/** "diplomatic 2", "normalization page 2" or "normalization document". */
export function unitOf(request: ModelRequest): string {
  if (request.phase === "diplomatic") return `diplomatic ${/^page: (\d+)$/m.exec(request.userText)?.[1] ?? "?"}`;
  return `normalization ${/^unit: (.+)$/m.exec(request.userText)?.[1] ?? "?"}`;
}

export type ScriptedReply = string | Error | "hang";
export type Script = (unit: string, call: number, request: ModelRequest) => ScriptedReply | undefined;

/**
 * Answers like a well-behaved model unless the script says otherwise: transcriptions are
 * `Page N text` with high confidence and normalization returns its input unchanged.
 */
export class ScriptedInvoker implements ModelInvoker {
  readonly requests: ModelRequest[] = [];
  private readonly calls = new Map<string, number>();

  constructor(private readonly script: Script = () => undefined) {}

  modelFor(phase: ModelRequest["phase"]): string {
    return `fake-${phase}`;
  }

  units(): string[] {
    return this.requests.map(unitOf);
  }

  async invoke(request: ModelRequest, signal: AbortSignal): Promise<string> {
    this.requests.push(request);
    const unit = unitOf(request);
    const call = (this.calls.get(unit) ?? 0) + 1;
    this.calls.set(unit, call);

    const reply = this.script(unit, call, request);
    if (reply instanceof Error) throw reply;
    if (reply === "hang") {
      return await new Promise<string>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("Cancelled")), { once: true });
      });
    }
    if (reply !== undefined) return reply;

    if (request.phase === "diplomatic") return diplomaticReply(Number(unit.split(" ")[1]));
    return formatNormalizationResponse({
      correctedText: normalizationInput(request),
      editLog: [],
      meta: { total_changes: 0, total_flags: 0, notes: "" }
    });
  }
}

export function makeDeps(
  layout: ProjectLayout,
  args: { pages: number; invoker?: ModelInvoker; env?: Record<string, string | undefined> }
): PipelineDeps & { rasterizer: FakeRasterizer; store: FileAgentStateStore } {
  const invoker = args.invoker;
  return {
    layout,
    store: new FileAgentStateStore(layout),
    log: new RunLog(layout),
    stubs: new FileStubStore(layout.stubsDir),
    rasterizer: new FakeRasterizer(args.pages),
    createInvoker: invoker ? () => invoker : undefined,
    env: args.env ?? {}
  };
}
