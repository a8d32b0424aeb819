import fs from "node:fs/promises";
import path from "node:path";
import { sha256Hex } from "./utils.js";

export const SOURCE_HASH_BYTES = 1024 * 1024;
export const SOURCE_HASH_LENGTH = 8;

async function readHead(filePath: string, maxBytes: number): Promise<Buffer> {
  const handle = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(maxBytes);
    const { bytesRead } = await handle.read(buf, 0, maxBytes, 0);
    return buf.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * `<stem>_<hash>` where hash is the first 8 hex chars of sha256 over the first MiB of
 * the file. Two copies of the same scan under different names get different ids; two
 * different scans sharing a stem do too.
 */
export async function computeSourceId(pdfPath: string): Promise<string> {
  const head = await readHead(pdfPath, SOURCE_HASH_BYTES);
  const stem = path.basename(pdfPath, path.extname(pdfPath));
  return `${stem}_${sha256Hex(head).slice(0, SOURCE_HASH_LENGTH)}`;
}

export function isPdfFileName(name: string): boolean {
  return name.endsWith(".pdf");
}

export async function listInputPdfs(inputPath: string): Promise<string[]> {
  const abs = path.resolve(inputPath);
  const stat = await fs.stat(abs).catch(() => null);
  if (!stat) throw new Error(`Invalid input path: ${abs}`);

  if (stat.isFile()) {
    if (!isPdfFileName(path.basename(abs))) throw new Error(`Expected PDF file: ${abs}`);
    return [abs];
  }

  const entries = await fs.readdir(abs, { withFileTypes: true });
  const pdfs = entries
    .filter((ent) => ent.isFile() && isPdfFileName(ent.name))
    .map((ent) => path.join(abs, ent.name))
    .sort();
  if (pdfs.length === 0) throw new Error(`No PDFs found in directory: ${abs}`);
  return pdfs;
}
