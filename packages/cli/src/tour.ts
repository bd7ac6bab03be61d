import type { PaginatorState } from '@featuretour/core';
import type { FeaturePaginator } from '@featuretour/paginator';
import { renderDetail, renderIntro } from './render.js';

export type TourScreen = 'intro' | 'detail';

export type TourRender = { type: 'render'; screen: TourScreen; output: string };

export type TourOutcome = TourRender | { type: 'quit' };

export const TOUR_HELP = [
  'Commands:',
  '  <number> or <topic id>  open a topic',
  '  open <topic id>         open a topic whose id is also a command',
  '  n                       next topic',
  '  p                       previous topic',
  '  l                       back to the list',
  '  h                       show this help',
  '  q                       quit',
].join('\n');

/**
 * Interactive view over a paginator. The session renders from the snapshots
 * it receives through its subscription and sends intents back.
 */
export type TourSession = {
  readonly screen: TourScreen;
  /**
   * The screen to show before any input (the topic list).
   */
  start(): TourRender;
  /**
   * Applies one line of user input and returns what to show next.
   * Paging keys only act on the detail screen.
   */
  handle(input: string): TourOutcome;
  /**
   * Stops listening to the paginator.
   */
  close(): void;
};

/**
 * Resolves a topic id or a 1-based list number. An exact id match wins, so
 * ids made of digits stay reachable.
 */
function resolveTopicId(state: PaginatorState, input: string): string | null {
  if (state.topics.some((t) => t.id === input)) return input;
  if (/^\d+$/.test(input)) {
    return state.topics[Number(input) - 1]?.id ?? null;
  }
  return null;
}

export function createTourSession(paginator: FeaturePaginator): TourSession {
  let screen: TourScreen = 'intro';
  let state = paginator.getSnapshot();
  const unsubscribe = paginator.subscribe((next) => {
    state = next;
  });

  const show = (next: TourScreen): TourRender => {
    screen = next;
    const output = next === 'intro' ? renderIntro(state.topics) : renderDetail(state);
    return { type: 'render', screen: next, output };
  };

  return {
    get screen() {
      return screen;
    },

    start: () => show('intro'),

    handle(input: string): TourOutcome {
      const command = input.trim();

      // Commands are case-sensitive so ids like "N" are not taken as paging keys
      switch (command) {
        case 'q':
        case 'quit':
          return { type: 'quit' };
        case '':
          return show(screen);
        case 'h':
        case '?':
          return { type: 'render', screen, output: TOUR_HELP };
        case 'l':
          return show('intro');
        case 'n':
          if (screen === 'detail') paginator.advance();
          return show(screen);
        case 'p':
          if (screen === 'detail') paginator.retreat();
          return show(screen);
      }

      const target = command.startsWith('open ') ? command.slice(5).trim() : command;
      const id = resolveTopicId(state, target);
      if (id === null) {
        return {
          type: 'render',
          screen,
          output: `Unknown command: ${command}\n${TOUR_HELP}`,
        };
      }

      paginator.selectById(id);
      return show('detail');
    },

    close: unsubscribe,
  };
}
