import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { EXIT_OK, EXIT_RUN_FAILED, EXIT_USAGE, parseCliArgs, runCli, USAGE, type CliIo, type CliOverrides } from "../src/batch_runner.js";
import { ConfigurationError } from "../src/config.js";
import { computeSourceId } from "../src/pipeline/source_id.js";
import { projectLayout } from "../src/pipeline/utils.js";
import { diplomaticReply, FakeRasterizer, ScriptedInvoker, writePrompts } from "./fixtures.js";

let tmp: string;
let root: string;
let inputDir: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "mts-cli-"));
  root = path.join(tmp, "project");
  inputDir = path.join(tmp, "in");
  await writePrompts(projectLayout(root));
  await fs.mkdir(inputDir);
  await fs.writeFile(path.join(inputDir, "a.pdf"), "%PDF-1.4 first");
  await fs.writeFile(path.join(inputDir, "b.pdf"), "%PDF-1.4 second");
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true }).catch(() => undefined);
});

type Captured = CliIo & { outLines: string[]; errLines: string[] };

function capture(): Captured {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return { outLines, errLines, out: (l) => outLines.push(l), err: (l) => errLines.push(l) };
}

function overrides(extra: CliOverrides = {}): CliOverrides {
  return { env: {}, rasterizer: new FakeRasterizer(2), echo: false, ...extra };
}

async function cli(args: string[], extra: CliOverrides = {}): Promise<{ code: number; io: Captured }> {
  const io = capture();
  const code = await runCli(args, io, overrides(extra));
  return { code, io };
}

function doneSummary(sourceId: string): string[] {
  return [
    `${sourceId}: stage done`,
    "  page 1: succeeded",
    "  page 2: succeeded",
    "  v1: 2/2 page(s)",
    "  v2: 2/2 page(s)"
  ];
}

describe("batch_runner", () => {
  describe("parseCliArgs", () => {
    it("builds a requeue command", () => {
      expect(parseCliArgs(["a.pdf", "--requeue", "3", "--phase", "normalization", "--force", "--no-api"])).toEqual({
        kind: "requeue",
        input: "a.pdf",
        options: { useApi: false, hitl: true },
        page: 3,
        phase: "normalization",
        force: true
      });
    });

    it("maps run flags onto run options", () => {
      expect(
        parseCliArgs(["in", "--project-root", "/p", "--lang", "de", "--no-hitl", "--stub-mode", "replay", "--normalize-mode", "document"])
      ).toEqual({
        kind: "run",
        input: "in",
        options: { useApi: true, hitl: false, projectRoot: "/p", language: "de", stubMode: "replay", normalizeMode: "document" }
      });
      expect(parseCliArgs(["in", "--status"]).kind).toBe("status");
      expect(parseCliArgs(["in", "--accept", "2"])).toMatchObject({ kind: "accept", page: 2 });
      expect(parseCliArgs(["-h"])).toEqual({ kind: "help" });
    });

    it("rejects bad pages, phases and positionals", () => {
      expect(() => parseCliArgs(["a.pdf", "--requeue", "0"])).toThrow('--requeue expects a page number, got "0"');
      expect(() => parseCliArgs(["a.pdf", "--requeue", "1", "--phase", "layout"])).toThrow('Unknown phase "layout"');
      expect(() => parseCliArgs([])).toThrow("Expected exactly one input path");
      expect(() => parseCliArgs(["a.pdf", "--colour"])).toThrow(ConfigurationError);
    });
  });

  it("prints usage for --help", async () => {
    const { code, io } = await cli(["--help"]);
    expect(code).toBe(EXIT_OK);
    expect(io.outLines).toEqual([USAGE]);
  });

  it("exits with the usage code on configuration errors", async () => {
    const noInput = await cli([]);
    expect(noInput.code).toBe(EXIT_USAGE);
    expect(noInput.io.errLines).toEqual(["Expected exactly one input path", USAGE]);

    const badMode = await cli([inputDir, "--project-root", root, "--stub-mode", "sometimes"]);
    expect(badMode.code).toBe(EXIT_USAGE);
    expect(badMode.io.errLines[0]).toMatch(/^Invalid run options: stubMode /);

    const missing = await cli([path.join(tmp, "absent"), "--project-root", root]);
    expect(missing.code).toBe(EXIT_USAGE);
    expect(missing.io.errLines[0]).toBe(`Invalid input path: ${path.join(tmp, "absent")}`);
  });

  it("runs every PDF in a directory offline", async () => {
    const a = await computeSourceId(path.join(inputDir, "a.pdf"));
    const b = await computeSourceId(path.join(inputDir, "b.pdf"));

    const { code, io } = await cli([inputDir, "--project-root", root, "--no-api"]);
    expect(code).toBe(EXIT_OK);
    expect(io.outLines).toEqual([...doneSummary(a), ...doneSummary(b)]);
    expect(io.errLines).toEqual([]);
  });

  it("reports status with and without state", async () => {
    const pdf = path.join(inputDir, "a.pdf");
    const id = await computeSourceId(pdf);

    const before = await cli([pdf, "--project-root", root, "--status"]);
    expect(before.io.outLines).toEqual([`${id}: no agent state`]);

    await cli([pdf, "--project-root", root, "--no-api"]);
    const after = await cli([pdf, "--project-root", root, "--status"]);
    expect(after.code).toBe(EXIT_OK);
    expect(after.io.outLines).toEqual(doneSummary(id));
  });

  it("requeues a page only with --force once it succeeded", async () => {
    const pdf = path.join(inputDir, "a.pdf");
    const id = await computeSourceId(pdf);

    const noState = await cli([pdf, "--project-root", root, "--requeue", "1"]);
    expect(noState.code).toBe(EXIT_USAGE);
    expect(noState.io.errLines).toEqual([`${id}: No agent state for ${id}; run it first`]);

    await cli([pdf, "--project-root", root, "--no-api"]);

    const refused = await cli([pdf, "--project-root", root, "--requeue", "1"]);
    expect(refused.code).toBe(EXIT_RUN_FAILED);
    expect(refused.io.errLines).toEqual([`${id}: Invalid unit transition succeeded -> pending`, "Pass --force to reprocess a succeeded page"]);

    const forced = await cli([pdf, "--project-root", root, "--requeue", "1", "--force"]);
    expect(forced.code).toBe(EXIT_OK);
    expect(forced.io.outLines.slice(0, 3)).toEqual([`${id}: page 1 requeued (diplomatic)`, `${id}: stage done`, "  page 1: pending"]);

    const rerun = await cli([pdf, "--project-root", root, "--no-api"]);
    expect(rerun.io.outLines).toEqual(doneSummary(id));
  });

  it("fails with the usage code when a live run has no key", async () => {
    const pdf = path.join(inputDir, "a.pdf");
    const id = await computeSourceId(pdf);

    const { code, io } = await cli([pdf, "--project-root", root]);
    expect(code).toBe(EXIT_USAGE);
    expect(io.errLines).toEqual([`${id}: Missing OPENAI_API_KEY; set it or run with --no-api`]);
  });

  it("pauses for review and continues after --accept", async () => {
    const pdf = path.join(inputDir, "a.pdf");
    const id = await computeSourceId(pdf);
    const invoker = new ScriptedInvoker((unit) => (unit === "diplomatic 2" ? diplomaticReply(2, "low") : undefined));
    const live: CliOverrides = { createInvoker: () => invoker };

    const paused = await cli([pdf, "--project-root", root], live);
    expect(paused.code).toBe(EXIT_OK);
    expect(paused.io.outLines).toEqual([`${id}: paused (Pages awaiting review: 2); review with --accept <page> then run again`]);

    const accepted = await cli([pdf, "--project-root", root, "--accept", "2"], live);
    expect(accepted.io.outLines).toEqual([
      `${id}: page 2 accepted`,
      `${id}: stage v1_ready`,
      "  page 1: succeeded",
      "  page 2: succeeded",
      "  v1: 2/2 page(s)",
      "  v2: not produced"
    ]);

    const resumed = await cli([pdf, "--project-root", root], live);
    expect(resumed.code).toBe(EXIT_OK);
    expect(resumed.io.outLines).toEqual(doneSummary(id));
  });

  it("keeps going after a failed source and exits with the run-failed code", async () => {
    const b = await computeSourceId(path.join(inputDir, "b.pdf"));
    const rasterizer = {
      calls: 0,
      async rasterize(args: { sourceId: string; imagesDir: string }): Promise<string[]> {
        this.calls += 1;
        if (this.calls === 1) throw new Error("pdftoppm produced no images");
        return new FakeRasterizer(2).rasterize(args);
      }
    };

    const { code, io } = await cli([inputDir, "--project-root", root, "--no-api"], { rasterizer });
    expect(code).toBe(EXIT_RUN_FAILED);
    expect(io.errLines).toHaveLength(1);
    expect(io.errLines[0]).toMatch(/^a_[0-9a-f]{8}: pdftoppm produced no images$/);
    expect(io.outLines).toEqual(doneSummary(b));
  });
});
