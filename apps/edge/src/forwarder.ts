import type { AnomalyTriggerV1 } from "@pdm/contracts";
import type { FetchLike } from "@pdm/runtime";
import { postJson } from "@pdm/runtime";

export interface TriggerForwarder {
  forward(trigger: AnomalyTriggerV1): Promise<unknown>;
}

/** POSTs the trigger to the agent; any non-2xx or timeout rejects. */
export class HttpTriggerForwarder implements TriggerForwarder {
  constructor(
    private readonly endpoint: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl?: FetchLike,
  ) {}

  forward(trigger: AnomalyTriggerV1): Promise<unknown> {
    return postJson(this.endpoint, trigger, { timeoutMs: this.timeoutMs, fetchImpl: this.fetchImpl });
  }
}
