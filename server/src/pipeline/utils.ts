import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { fileURLToPath } from "node:url";

export const AGENT_STATE_DIRNAME = "agent_state";
export const WORK_DIRNAME = "work";
export const OUTPUT_DIRNAME = "output";
export const STUBS_DIRNAME = "stubs";
export const LOGS_DIRNAME = "logs";
export const PROMPTS_DIRNAME = path.join("specs", "prompts");

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // This file lives at server/src/pipeline/utils.ts
  // repo root is three levels up: pipeline -> src -> server -> repo
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

export function projectRootAbs(explicit?: string): string {
  if (explicit && explicit.trim().length > 0) return path.resolve(explicit.trim());
  const env = process.env.TRANSCRIBE_PROJECT_ROOT;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "project");
}

/**
 * Resolved on-disk layout of one project root. Everything the agent persists lives
 * under these directories, keyed by source id.
 */
export type ProjectLayout = {
  root: string;
  agentStateDir: string;
  stubsDir: string;
  promptsDir: string;
  stateFile(sourceId: string): string;
  lockFile(sourceId: string): string;
  imagesDir(sourceId: string): string;
  diplomaticDir(sourceId: string): string;
  outputDir(sourceId: string): string;
  logFile(sourceId: string): string;
  outputFile(sourceId: string, kind: OutputKind): string;
};

export type OutputKind = "diplomatic_v1" | "coverage_v1" | "corrected_v2" | "editlog_v2";

const OUTPUT_FILE_SUFFIX: Record<OutputKind, string> = {
  diplomatic_v1: "_diplomatic_v1.txt",
  coverage_v1: "_coverage_v1.json",
  corrected_v2: "_corrected_v2.txt",
  editlog_v2: "_editlog_v2.json"
};

export function projectLayout(root: string): ProjectLayout {
  const agentStateDir = path.join(root, AGENT_STATE_DIRNAME);
  const workDir = (sourceId: string) => path.join(root, WORK_DIRNAME, sourceId);
  const outputDir = (sourceId: string) => path.join(root, OUTPUT_DIRNAME, sourceId);
  return {
    root,
    agentStateDir,
    stubsDir: path.join(root, STUBS_DIRNAME),
    promptsDir: path.join(root, PROMPTS_DIRNAME),
    stateFile: (sourceId) => path.join(agentStateDir, `${sourceId}.state.json`),
    lockFile: (sourceId) => path.join(agentStateDir, `${sourceId}.lock`),
    imagesDir: (sourceId) => path.join(workDir(sourceId), "images"),
    diplomaticDir: (sourceId) => path.join(workDir(sourceId), "diplomatic"),
    outputDir,
    logFile: (sourceId) => path.join(root, LOGS_DIRNAME, sourceId, "run.log"),
    outputFile: (sourceId, kind) => path.join(outputDir(sourceId), `${sourceId}${OUTPUT_FILE_SUFFIX[kind]}`)
  };
}

export function pageId(sourceId: string, page: number): string {
  return `${sourceId}_p${String(page).padStart(3, "0")}`;
}

export function sha256Hex(content: string | Buffer): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

/** Writes `text` byte-for-byte; used where replay must reproduce exactly what was stored. */
export async function writeRawTextFile(filePath: string, text: string): Promise<void> {
  await atomicWrite(filePath, text);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export async function tryReadJsonFile(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch {
    return null;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export function isSafeArtifactName(name: string): boolean {
  // Prevent path traversal and keep filenames predictable.
  if (name.includes("/") || name.includes("\\") || name.includes("..")) return false;
  return /^[A-Za-z0-9._-]+$/.test(name);
}

/** Source ids carry the PDF stem, so anything goes except path separators. */
export function isSafeSourceId(sourceId: string): boolean {
  return sourceId.length > 0 && !sourceId.includes("/") && !sourceId.includes("\\") && !sourceId.includes("..");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function wait(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("Cancelled"));
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      reject(new Error("Cancelled"));
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
