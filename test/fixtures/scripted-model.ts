import type { CompletionRequest, ModelBackend } from "../../src/model/model-backend.js";

type Reply = string | Error;

/**
 * Model backend that plays back canned replies in order and records every
 * request it was given.
 */
export class ScriptedModel implements ModelBackend {
  public readonly modelId = "scripted-model";
  public readonly requests: CompletionRequest[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[] = []) {
    this.replies = [...replies];
  }

  public complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      return Promise.reject(new Error("ScriptedModel has no reply left"));
    }
    return reply instanceof Error ? Promise.reject(reply) : Promise.resolve(reply);
  }
}
