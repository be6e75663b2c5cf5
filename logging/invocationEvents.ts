/**
 * Structured lifecycle events for one invocation.
 *
 * One JSON object per line. Never pass the API key or the prompt body.
 */

export type InvocationEvent =
  | "invocation.started"
  | "invocation.llm.requested"
  | "invocation.llm.failed"
  | "invocation.persisted"
  | "invocation.failed";

export type InvocationEventData = {
  event: InvocationEvent;
  kairos_id?: string;
  motd_file?: string;
  model?: string;
  scroll_file?: string;
  log_file?: string;
  error_kind?: string;
  error_message?: string;
  [key: string]: unknown;
};

export function invocationLog(data: InvocationEventData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const invocationLogHelpers = {
  started(params: { kairos_id: string; motd_file: string }): void {
    invocationLog({ event: "invocation.started", ...params });
  },

  llmRequested(params: { kairos_id: string; model: string }): void {
    invocationLog({ event: "invocation.llm.requested", ...params });
  },

  llmFailed(params: { kairos_id: string; model: string; error_kind: string; error_message: string }): void {
    invocationLog({ event: "invocation.llm.failed", ...params });
  },

  persisted(params: { kairos_id: string; scroll_file: string; log_file: string }): void {
    invocationLog({ event: "invocation.persisted", ...params });
  },

  failed(params: { error_kind: string; error_message: string }): void {
    invocationLog({ event: "invocation.failed", ...params });
  },
};
