import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { RunLog } = await import("./run_log.js");
const { FileAgentStateStore } = await import("./state_store.js");
const { FileStubStore } = await import("./pipeline/stub_store.js");
const { PdftoppmRasterizer } = await import("./pipeline/rasterizer.js");
const { sourcePipelineFn } = await import("./pipeline/pipeline.js");
const { projectLayout, projectRootAbs } = await import("./pipeline/utils.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

const layout = projectLayout(projectRootAbs());
const store = new FileAgentStateStore(layout);
const log = new RunLog(layout, { echo: true });

const executor = new RunExecutor(
  log,
  sourcePipelineFn({
    layout,
    store,
    log,
    stubs: new FileStubStore(layout.stubsDir),
    rasterizer: new PdftoppmRasterizer(process.env.PDFTOPPM_PATH?.trim() || undefined)
  })
);
const app = createApp({ layout, store, log, executor });

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port} (project root ${layout.root})`);
});
