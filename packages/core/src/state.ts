import type { Topic } from "./topic";

/**
 * Immutable snapshot of the paginator: the catalog plus the current position.
 *
 * Everything else (current topic, navigation flags) is derived with the
 * selectors below and never stored.
 */
export type PaginatorState = {
  readonly topics: readonly Topic[];
  readonly currentIndex: number;
};

function clampIndex(index: number, count: number): number {
  if (count === 0 || !Number.isInteger(index) || index < 0) return 0;
  return Math.min(index, count - 1);
}

/**
 * Creates a frozen snapshot. The index is clamped into `[0, count - 1]`.
 */
export function createPaginatorState(
  topics: readonly Topic[],
  currentIndex = 0,
): PaginatorState {
  return Object.freeze({
    topics,
    currentIndex: clampIndex(currentIndex, topics.length),
  });
}

export function currentTopic(state: PaginatorState): Topic | null {
  return state.topics[state.currentIndex] ?? null;
}

export function canRetreat(state: PaginatorState): boolean {
  return state.currentIndex > 0;
}

export function canAdvance(state: PaginatorState): boolean {
  return state.currentIndex < state.topics.length - 1;
}

/**
 * Human-readable position, e.g. `"3 / 5"`. An empty catalog reads `"0 / 0"`.
 */
export function pageIndicator(state: PaginatorState): string {
  if (state.topics.length === 0) return "0 / 0";
  return `${state.currentIndex + 1} / ${state.topics.length}`;
}
