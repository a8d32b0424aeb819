import fs from "node:fs/promises";
import path from "node:path";
import { Agent, Runner, setDefaultOpenAIKey, type AgentInputItem } from "@openai/agents";
import type { Phase } from "../state_store.js";

const PHASE_SETTINGS: Record<Phase, { name: string; temperature: number }> = {
  diplomatic: { name: "Diplomatic Transcriber", temperature: 0 },
  normalization: { name: "Transcription Normalizer", temperature: 0.1 }
};

export type ModelRequest = {
  phase: Phase;
  /** System rules, i.e. the phase prompt file read verbatim. */
  instructions: string;
  userText: string;
  imagePath?: string;
};

export interface ModelInvoker {
  modelFor(phase: Phase): string;
  invoke(request: ModelRequest, signal: AbortSignal): Promise<string>;
}

export type OpenAiInvokerOptions = {
  apiKey: string;
  models: Record<Phase, string>;
  runner?: Runner;
};

function imageMimeType(imagePath: string): string {
  const ext = path.extname(imagePath).toLowerCase();
  if (ext === ".jpg" || ext === ".jpeg") return "image/jpeg";
  if (ext === ".webp") return "image/webp";
  return "image/png";
}

async function imageDataUrl(imagePath: string): Promise<string> {
  const bytes = await fs.readFile(imagePath);
  return `data:${imageMimeType(imagePath)};base64,${bytes.toString("base64")}`;
}

export class OpenAiAgentsInvoker implements ModelInvoker {
  private readonly runner: Runner;
  private readonly models: Record<Phase, string>;

  constructor(options: OpenAiInvokerOptions) {
    setDefaultOpenAIKey(options.apiKey);
    this.runner = options.runner ?? new Runner();
    this.models = options.models;
  }

  modelFor(phase: Phase): string {
    return this.models[phase];
  }

  async invoke(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const settings = PHASE_SETTINGS[request.phase];
    const agent = new Agent({
      name: settings.name,
      model: this.modelFor(request.phase),
      modelSettings: { temperature: settings.temperature },
      tools: [],
      instructions: request.instructions
    });

    let input: string | AgentInputItem[] = request.userText;
    if (request.imagePath) {
      input = [
        {
          role: "user",
          content: [
            { type: "input_text", text: request.userText },
            { type: "input_image", image: await imageDataUrl(request.imagePath) }
          ]
        }
      ];
    }

    const result = await this.runner.run(agent, input, { maxTurns: 2, signal });
    const output = result.finalOutput;
    if (typeof output !== "string" || output.trim().length === 0) {
      throw new Error(`${settings.name} produced no final output`);
    }
    return output;
  }
}
