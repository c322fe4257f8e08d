import { TransportError } from "../errors.js";
import type { JsonResponse } from "../integrations/http.js";
import type { Logger } from "../logger.js";
import type { WorkflowStepResult } from "../models.js";

/**
 * Append-only audit trail of the calls one workflow run makes. Failed calls
 * are recorded too: the entry carries whatever the error saw of the
 * response (status, request id) and the error message.
 */
export class StepLog {
  private readonly entries: WorkflowStepResult[] = [];

  constructor(private readonly log?: Logger) {}

  get steps(): WorkflowStepResult[] {
    return [...this.entries];
  }

  async run(name: string, call: () => Promise<JsonResponse>): Promise<JsonResponse> {
    try {
      const res = await call();
      this.entries.push({
        name,
        method: res.debug.method,
        url: res.debug.url,
        status_code: res.debug.statusCode,
        request_id: res.debug.requestId,
        error: null
      });
      this.log?.debug({ step: name, status: res.debug.statusCode }, "Workflow step ok");
      return res;
    } catch (err) {
      const debug = err instanceof TransportError ? err.debug : null;
      const message = err instanceof Error ? err.message : String(err);
      this.entries.push({
        name,
        method: debug?.method ?? "",
        url: debug?.url ?? "",
        status_code: debug?.statusCode ?? null,
        request_id: debug?.requestId ?? null,
        error: message
      });
      this.log?.warn({ step: name, status: debug?.statusCode ?? null, err: message }, "Workflow step failed");
      throw err;
    }
  }
}
