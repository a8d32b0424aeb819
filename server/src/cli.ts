#!/usr/bin/env node
import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic import so `.env` is loaded before any modules read process.env at import-time.
const { runCli } = await import("./batch_runner.js");

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("Interrupted; finishing the current save and stopping");
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), undefined, { signal: controller.signal });
