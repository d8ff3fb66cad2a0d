/**
 * @netlens/assistant - Prior-turn context helpers
 */

import type { AssistantContext } from './types.js';

/**
 * Drop blank fields; null when nothing is left.
 */
export function normalizeContext(context: AssistantContext | null | undefined): AssistantContext | null {
  if (!context) return null;

  const result: AssistantContext = {};
  const tool = context.tool?.trim();
  const target = context.target?.trim();
  const summary = context.summary?.trim();
  const timestamp = context.timestamp?.trim();

  if (tool) result.tool = tool;
  if (target) result.target = target;
  if (summary) result.summary = summary;
  if (timestamp) result.timestamp = timestamp;

  return Object.keys(result).length > 0 ? result : null;
}

/**
 * Short human-readable line, e.g. "Latest port scan on example.com (443 open)".
 */
export function contextLine(context: AssistantContext | null): string {
  if (!context) return '';

  const parts: string[] = [];
  if (context.tool) parts.push(`Latest ${context.tool.replace(/_/g, ' ')}`);
  if (context.target) parts.push(`on ${context.target}`);
  if (context.summary) parts.push(`(${context.summary})`);
  return parts.join(' ').trim();
}

/**
 * Compact string scoping cache entries to the user's recent activity. The
 * timestamp is left out so the same activity maps to the same entries.
 */
export function contextFingerprint(context: AssistantContext | null): string {
  if (!context) return '';
  const parts = [context.tool ?? '', context.target ?? '', context.summary ?? ''];
  return parts.some(Boolean) ? parts.join('|') : '';
}
