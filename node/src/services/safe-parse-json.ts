/**
 * Shared JSON parse for LLM replies: strips markdown fences, falls back to the first
 * `{...}` block when the model wraps JSON in prose.
 */
import { logger } from '@/services/logger';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function safeParseJson(raw: string, context: string): Record<string, unknown> {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }

  const direct = tryParse(txt);
  if (direct) return direct;

  const block = txt.match(/\{[\s\S]*\}/);
  if (block) {
    const embedded = tryParse(block[0]);
    if (embedded) return embedded;
  }

  logger.warn('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  return {};
}
