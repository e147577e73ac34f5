/**
 * Shared request/response handling for the OpenAI chat completions shape,
 * used by both OpenAI and Azure OpenAI
 */

import { z } from 'zod'
import type { LLMMessage, LLMResponse } from '../llm-provider'
import { GenerationError } from '../../errors'

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }).optional(),
})

export function completionBody(
  messages: LLMMessage[],
  params: { temperature?: number; maxTokens?: number; topP?: number }
): Record<string, unknown> {
  return {
    messages: messages.map(m => ({
      role: m.role,
      content: m.content,
    })),
    temperature: params.temperature ?? 0.7,
    max_tokens: params.maxTokens,
    top_p: params.topP,
  }
}

export async function readCompletion(label: string, response: Response, fallbackModel: string): Promise<LLMResponse> {
  if (!response.ok) {
    const error = await response.text()
    throw new GenerationError(`${label} API error: ${response.status} - ${error}`)
  }

  const parsed = ChatCompletionSchema.safeParse(await response.json())
  if (!parsed.success) {
    throw new GenerationError(`${label} API returned an unexpected payload`)
  }

  const data = parsed.data
  const [choice] = data.choices
  return {
    content: choice.message.content ?? '',
    usage: {
      promptTokens: data.usage?.prompt_tokens ?? 0,
      completionTokens: data.usage?.completion_tokens ?? 0,
      totalTokens: data.usage?.total_tokens ?? 0,
    },
    model: data.model ?? fallbackModel,
    finishReason: choice.finish_reason ?? undefined,
  }
}
