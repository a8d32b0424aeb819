import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir, pageId } from "./utils.js";

export interface PageRasterizer {
  /** Renders every page of `pdfPath` and returns the image paths in page order. */
  rasterize(args: { pdfPath: string; imagesDir: string; sourceId: string; dpi: number; signal: AbortSignal }): Promise<string[]>;
}

function runCommand(file: string, args: string[], signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(file, args, { signal, maxBuffer: 16 * 1024 * 1024 }, (err, stdout, stderr) => {
      if (err) {
        reject(new Error(`Command failed: ${file} ${args.join(" ")}\nSTDOUT:\n${stdout}\nSTDERR:\n${stderr}`));
        return;
      }
      resolve();
    });
  });
}

// pdftoppm numbers its output `<prefix>-1.png`, `<prefix>-01.png`, ... depending on page count.
const PDFTOPPM_OUTPUT_RE = /-(\d+)\.png$/;

export class PdftoppmRasterizer implements PageRasterizer {
  constructor(private readonly binary = "pdftoppm") {}

  async rasterize(args: { pdfPath: string; imagesDir: string; sourceId: string; dpi: number; signal: AbortSignal }): Promise<string[]> {
    const { pdfPath, imagesDir, sourceId, dpi, signal } = args;
    await ensureDir(imagesDir);
    const prefix = path.join(imagesDir, `${sourceId}_p`);
    await runCommand(this.binary, ["-png", "-r", String(dpi), pdfPath, prefix], signal);

    const generated = (await fs.readdir(imagesDir))
      .filter((name) => name.startsWith(`${sourceId}_p-`) && PDFTOPPM_OUTPUT_RE.test(name))
      .map((name) => ({ name, n: Number(PDFTOPPM_OUTPUT_RE.exec(name)?.[1] ?? 0) }))
      .sort((a, b) => a.n - b.n);
    if (generated.length === 0) throw new Error(`pdftoppm produced no images for ${pdfPath}`);

    const out: string[] = [];
    for (let i = 0; i < generated.length; i++) {
      const target = path.join(imagesDir, `${pageId(sourceId, i + 1)}.png`);
      await fs.rename(path.join(imagesDir, generated[i].name), target);
      out.push(target);
    }
    return out;
  }
}
