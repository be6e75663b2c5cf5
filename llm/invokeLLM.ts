import type { AssembledPrompt } from "../invocation/assembly/buildInvocationPrompt.js";
import type { LLMInvocationConfig } from "../config/invocationConfig.js";
import { ChatCompletionResponseSchema } from "./chatCompletion.schema.js";

export type LLMInvocationResult =
  | {
      status: "ok";
      text: string;
      model: string;
    }
  | {
      status: "error";
      error_type: "provider_error" | "invalid_response";
      message: string;
    };

/**
 * One chat-completion request. No sampling parameters and no timeout:
 * provider defaults and the transport's own limits apply.
 */
export async function invokeLLM(
  prompt: AssembledPrompt,
  params: { apiKey: string; config: LLMInvocationConfig }
): Promise<LLMInvocationResult> {
  const { apiKey, config } = params;

  let response: Response;
  try {
    response = await fetch(config.endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: config.model,
        messages: [
          { role: "system", content: prompt.system_prompt },
          { role: "user", content: prompt.user_prompt },
        ],
      }),
    });
  } catch (err) {
    return {
      status: "error",
      error_type: "provider_error",
      message: err instanceof Error ? err.message : "OpenAI invocation failed",
    };
  }

  if (!response.ok) {
    const errorText = await safeReadError(response);
    return {
      status: "error",
      error_type: "provider_error",
      message: `OpenAI error ${response.status}: ${errorText}`,
    };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    return {
      status: "error",
      error_type: "invalid_response",
      message: "OpenAI returned a non-JSON body",
    };
  }

  const parsed = ChatCompletionResponseSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: "error",
      error_type: "invalid_response",
      message: `Unexpected response shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    };
  }

  return {
    status: "ok",
    text: parsed.data.choices[0].message.content,
    model: parsed.data.model ?? config.model,
  };
}

async function safeReadError(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text || response.statusText || "Unknown provider error";
  } catch {
    return response.statusText || "Unknown provider error";
  }
}
