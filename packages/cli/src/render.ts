import {
  canAdvance,
  canRetreat,
  currentTopic,
  pageIndicator,
  type PaginatorState,
  type Topic,
} from '@featuretour/core';

export const INTRO_HEADING = 'Feature tour';

function indent(text: string, prefix: string): string[] {
  return text.split('\n').map((line) => `${prefix}${line}`);
}

/**
 * The list screen: every topic, numbered from 1.
 */
export function renderIntro(topics: readonly Topic[]): string {
  const lines = [INTRO_HEADING, '='.repeat(INTRO_HEADING.length)];

  if (topics.length === 0) {
    lines.push('No topics available.');
    return lines.join('\n');
  }

  topics.forEach((topic, i) => {
    lines.push(`${i + 1}. ${topic.title} (${topic.id})`);
    lines.push(...indent(topic.summary, '   '));
  });
  return lines.join('\n');
}

export function renderNotFound(id?: string): string {
  const message = id ? `Topic "${id}" not found.` : 'Topic not found.';
  return [message, '[l] back to list'].join('\n');
}

/**
 * Action bar for the detail screen. Only the moves the state allows are shown.
 */
export function renderActions(state: PaginatorState): string {
  const actions: string[] = [];
  if (canRetreat(state)) actions.push('[p] previous');
  if (canAdvance(state)) actions.push('[n] next');
  actions.push('[l] back to list');
  return actions.join('  ');
}

/**
 * The detail screen for the current topic, or the not-found fallback.
 */
export function renderDetail(state: PaginatorState): string {
  const topic = currentTopic(state);
  if (!topic) return renderNotFound();

  const lines = [topic.title, topic.summary];

  if (topic.highlights.length > 0) {
    lines.push('', 'Highlights');
    for (const highlight of topic.highlights) lines.push(`  - ${highlight}`);
  }

  if (topic.codeHint) {
    lines.push('', 'Code');
    lines.push(...indent(topic.codeHint, '    '));
  }

  lines.push('', `Page ${pageIndicator(state)}`, renderActions(state));
  return lines.join('\n');
}
