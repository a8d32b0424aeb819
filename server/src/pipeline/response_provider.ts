import { ConfigurationError, type StubMode } from "../config.js";
import type { ModelInvoker, ModelRequest } from "./model_invoker.js";
import { StubNotFoundError, type StubKey, type StubRequest, type StubStore } from "./stub_store.js";
import { nowIso } from "./utils.js";

export type ResponseRequest = {
  key: StubKey;
  stub: StubRequest;
  model: ModelRequest;
};

/**
 * "Obtain a raw model response" as one injectable capability. The state machine only
 * sees this interface, so its logic is identical for live, recorded and replayed runs.
 */
export interface ResponseProvider {
  readonly label: string;
  obtain(request: ResponseRequest, signal: AbortSignal): Promise<string>;
  /** Replaces the stored response for `request`; present on providers that record. */
  record?(request: ResponseRequest, raw: string): Promise<void>;
}

export class CallTimeoutError extends Error {
  timeoutMs: number;
  constructor(timeoutMs: number) {
    super(`Model call timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class GenerateStubProvider implements ResponseProvider {
  readonly label = "stub-generate";

  constructor(private readonly stubs: StubStore) {}

  async obtain(request: ResponseRequest): Promise<string> {
    const payload = this.stubs.generate(request.stub);
    await this.stubs.write(request.key, payload, {
      source_id: request.key.sourceId,
      unit_id: request.key.unitId,
      phase: request.key.phase,
      origin: "generated"
    });
    return payload;
  }
}

export class ReplayStubProvider implements ResponseProvider {
  readonly label: string;

  constructor(
    private readonly stubs: StubStore,
    private readonly fallback: GenerateStubProvider | null = null
  ) {
    this.label = fallback ? "stub-replay-or-generate" : "stub-replay";
  }

  async obtain(request: ResponseRequest): Promise<string> {
    try {
      return await this.stubs.read(request.key);
    } catch (err) {
      if (err instanceof StubNotFoundError && this.fallback) return await this.fallback.obtain(request);
      throw err;
    }
  }
}

export class LiveModelProvider implements ResponseProvider {
  readonly label: string;

  constructor(
    private readonly invoker: ModelInvoker,
    private readonly recordTo: StubStore | null = null
  ) {
    this.label = recordTo ? "live-record" : "live";
  }

  async obtain(request: ResponseRequest, signal: AbortSignal): Promise<string> {
    const raw = await this.invoker.invoke(request.model, signal);
    await this.record(request, raw);
    return raw;
  }

  async record(request: ResponseRequest, raw: string): Promise<void> {
    if (this.recordTo) {
      await this.recordTo.write(request.key, raw, {
        source_id: request.key.sourceId,
        unit_id: request.key.unitId,
        phase: request.key.phase,
        origin: "recorded",
        model: this.invoker.modelFor(request.key.phase),
        recorded_at: nowIso()
      });
    }
  }
}

/**
 * Maps the run switches to a provider:
 * - no api: replay falls back to generating; every other stub mode generates.
 * - api: replay is strict; record calls the model and stores the raw response.
 */
export function selectResponseProvider(
  mode: { useApi: boolean; stubMode: StubMode },
  deps: { stubs: StubStore; invoker: ModelInvoker | null }
): ResponseProvider {
  const generate = new GenerateStubProvider(deps.stubs);
  if (!mode.useApi) {
    return mode.stubMode === "replay" ? new ReplayStubProvider(deps.stubs, generate) : generate;
  }
  if (mode.stubMode === "replay") return new ReplayStubProvider(deps.stubs);
  if (!deps.invoker) throw new ConfigurationError("Live model calls requested but no model invoker is configured");
  return new LiveModelProvider(deps.invoker, mode.stubMode === "record" ? deps.stubs : null);
}

export async function obtainWithTimeout(
  provider: ResponseProvider,
  request: ResponseRequest,
  timeoutMs: number,
  signal: AbortSignal
): Promise<string> {
  if (signal.aborted) throw new Error("Cancelled");

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let rejectCancelled: (err: Error) => void = () => undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CallTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_resolve, reject) => {
    rejectCancelled = reject;
  });
  const onAbort = () => {
    controller.abort();
    rejectCancelled(new Error("Cancelled"));
  };
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([provider.obtain(request, controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", onAbort);
  }
}
