// src/services/narrative-generator.ts: LLM summary + highlights for a built itinerary
import { z } from 'zod';
import type { LlmClient } from '@/services/llm-client';
import { buildNarrativePrompt, NARRATIVE_SYSTEM, type NarrativePromptParams } from '@/services/prompt-templates';
import { safeParseJson } from '@/services/safe-parse-json';
import { CircuitBreaker } from '@/stability/circuitBreaker';

export type NarrativeRequest = NarrativePromptParams;

export interface Narrative {
  summaryText: string;
  highlights: string[];
  commentary: string;
}

export interface NarrativeGenerator {
  narrate(request: NarrativeRequest): Promise<Narrative>;
}

export class NarrativeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NarrativeError';
  }
}

const narrativeReplySchema = z.object({
  summary_text: z.string().trim().min(1),
  highlights: z.array(z.string()).default([]),
  ai_commentary: z.string().optional(),
});

export class LlmNarrativeGenerator implements NarrativeGenerator {
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly llm: LlmClient,
    options: { timeoutMs?: number } = {},
  ) {
    this.breaker = new CircuitBreaker('narrative-llm', {
      failureThreshold: 3,
      successThreshold: 1,
      timeout: options.timeoutMs ?? 20000,
      resetTimeout: 120000,
    });
  }

  /** Throws on transport failure, timeout, or a reply without a usable summary. */
  async narrate(request: NarrativeRequest): Promise<Narrative> {
    const prompt = buildNarrativePrompt(request);
    const raw = await this.breaker.execute(() =>
      this.llm.complete(prompt, { system: NARRATIVE_SYSTEM, temperature: 0.6 }),
    );
    if (!raw.trim()) {
      throw new NarrativeError('Narrative model returned an empty reply');
    }

    const parsed = narrativeReplySchema.safeParse(safeParseJson(raw, 'narrative'));
    if (!parsed.success) {
      throw new NarrativeError('Narrative reply did not contain a summary_text');
    }
    return {
      summaryText: parsed.data.summary_text,
      highlights: parsed.data.highlights.map((h) => h.trim()).filter(Boolean),
      commentary: parsed.data.ai_commentary?.trim() || 'Generated via AI summarization.',
    };
  }
}
