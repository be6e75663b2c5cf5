import { z } from "zod";

// Only the fields we read; the provider may send more.
export const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string(),
        }),
      })
    )
    .min(1, "response has no choices"),
});
