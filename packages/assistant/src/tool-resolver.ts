/**
 * @netlens/assistant - ToolResolver
 *
 * Picks the diagnostic tool a free-text question is about:
 *   1. An explicit hint naming a known tool
 *   2. Keyword scoring: +3 when the tool name appears, +1 per keyword
 *   3. null when nothing scores
 */

import type { GuidanceCatalog } from './guidance.js';

const NAME_WEIGHT = 3;
const KEYWORD_WEIGHT = 1;

export class ToolResolver {
  constructor(private readonly catalog: GuidanceCatalog) {}

  resolve(questionText: string, toolHint?: string | null): string | null {
    const hint = (toolHint ?? '').trim().toLowerCase();
    if (hint && this.catalog.has(hint)) {
      return hint;
    }

    const text = questionText.toLowerCase();
    let bestTool: string | null = null;
    let bestScore = 0;

    for (const [tool, guidance] of this.catalog.list()) {
      let score = text.includes(tool) ? NAME_WEIGHT : 0;
      for (const keyword of guidance.keywords) {
        if (text.includes(keyword)) score += KEYWORD_WEIGHT;
      }
      // Strictly greater: ties keep the earlier tool
      if (score > bestScore) {
        bestScore = score;
        bestTool = tool;
      }
    }

    return bestTool;
  }
}
