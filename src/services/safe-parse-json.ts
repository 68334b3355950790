/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used by the reranker to read model output.
 */
import { logger } from '@/services/logger';

export function safeParseJson(raw: string, context: string): unknown {
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

  try {
    return JSON.parse(txt);
  } catch {
    try {
      return JSON.parse(txt.replace(/'/g, '"'));
    } catch {
      logger.warn('safeParseJson:parse_error', {
        context,
        error: 'Invalid JSON after stripping fences',
        raw: txt.slice(0, 300),
      });
      return null;
    }
  }
}
