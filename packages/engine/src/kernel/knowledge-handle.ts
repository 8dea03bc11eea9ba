import { KnowledgeBase } from './knowledge-base.js';
import type { KnowledgeBaseOptions } from './knowledge-config.js';

let current: KnowledgeBase | undefined;

/** Installs a fresh process-wide knowledge base; a second call without a reset fails. */
export function initializeKnowledgeBase(options: KnowledgeBaseOptions = {}): KnowledgeBase {
  if (current !== undefined) {
    throw new Error('Knowledge base already initialized; call resetKnowledgeBase() first');
  }
  current = new KnowledgeBase(options);
  return current;
}

export function getKnowledgeBase(): KnowledgeBase {
  if (current === undefined) {
    throw new Error('Knowledge base not initialized; call initializeKnowledgeBase() first');
  }
  return current;
}

export const hasKnowledgeBase = (): boolean => current !== undefined;

export function resetKnowledgeBase(): void {
  current = undefined;
}
