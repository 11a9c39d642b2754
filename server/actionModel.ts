import OpenAI from "openai";

/**
 * Anything that can turn a prompt into raw model text.
 * The generator only sees this seam, so tests swap in a fake.
 */
export interface ActionModel {
  readonly name: string;
  complete(prompt: string): Promise<string>;
}

export type OpenAIActionModelOptions = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export class OpenAIActionModel implements ActionModel {
  readonly name = "openai";
  private client: OpenAI;
  private model: string;

  constructor(opts: OpenAIActionModelOptions) {
    // No retries: a slow or failing call should drop to the offline list quickly
    this.client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
    this.model = opts.model;
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: 0.4,
    });
    return response.choices[0]?.message?.content?.trim() ?? "";
  }
}
