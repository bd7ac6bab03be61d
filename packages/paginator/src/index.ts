import type {
  CatalogSource,
  Logger,
  PaginatorState,
  Topic,
  TopicId,
} from "@featuretour/core";
import {
  canAdvance,
  canRetreat,
  createPaginatorState,
} from "@featuretour/core";

/**
 * User-triggered request to move the paginator.
 */
export type PaginatorIntent =
  | { type: "select"; id: TopicId }
  | { type: "advance" }
  | { type: "retreat" };

export type PaginatorListener = (state: PaginatorState) => void;

export type FeaturePaginatorOptions = {
  /**
   * Ordered topic catalog. Fixed for the lifetime of the paginator.
   */
  topics: readonly Topic[];

  /**
   * Receives a message for every ignored intent and for listener failures.
   */
  logger?: Logger;
};

/**
 * Computes the next snapshot for an intent. Returns the same object when the
 * intent does not apply, together with the reason it was ignored.
 */
function reduce(
  state: PaginatorState,
  intent: PaginatorIntent,
): { next: PaginatorState; ignored?: string } {
  switch (intent.type) {
    case "select": {
      const index = state.topics.findIndex((t) => t.id === intent.id);
      if (index < 0) {
        return {
          next: state,
          ignored: `ignored select: unknown topic id "${intent.id}"`,
        };
      }
      if (index === state.currentIndex) return { next: state };
      return { next: createPaginatorState(state.topics, index) };
    }
    case "advance":
      if (!canAdvance(state)) {
        return {
          next: state,
          ignored: "ignored advance: already at last topic",
        };
      }
      return {
        next: createPaginatorState(state.topics, state.currentIndex + 1),
      };
    case "retreat":
      if (!canRetreat(state)) {
        return {
          next: state,
          ignored: "ignored retreat: already at first topic",
        };
      }
      return {
        next: createPaginatorState(state.topics, state.currentIndex - 1),
      };
  }
}

/**
 * Holds the current position over a fixed topic catalog.
 *
 * Every operation is total: unknown ids and moves past either end leave the
 * state untouched. Each change replaces the snapshot wholesale and is pushed
 * to subscribers synchronously.
 *
 * @example
 * ```ts
 * const paginator = new FeaturePaginator({ topics });
 * const unsubscribe = paginator.subscribe((state) => render(state));
 *
 * paginator.selectById('navigation');
 * paginator.advance();
 * unsubscribe();
 * ```
 */
export class FeaturePaginator {
  private state: PaginatorState;
  private listeners = new Set<PaginatorListener>();
  private readonly logger: Logger;
  // Intents issued while listeners run wait here until the pass completes
  private pending: PaginatorIntent[] = [];
  private notifyDepth = 0;

  constructor(options: FeaturePaginatorOptions) {
    // Own copy: later changes to the caller's array must not reach the catalog
    this.state = createPaginatorState(Object.freeze([...options.topics]), 0);
    this.logger = options.logger ?? {};
  }

  /**
   * Builds a paginator over the topics provided by a catalog source.
   */
  static fromSource(
    source: CatalogSource,
    options: Omit<FeaturePaginatorOptions, "topics"> = {},
  ): FeaturePaginator {
    return new FeaturePaginator({ ...options, topics: source.loadTopics() });
  }

  getSnapshot(): PaginatorState {
    return this.state;
  }

  /**
   * Registers a listener. It is called right away with the current snapshot
   * and then after every change.
   *
   * @returns Function that removes the listener
   */
  subscribe(listener: PaginatorListener): () => void {
    // Wrap so the same function can be subscribed twice and removed independently
    const entry: PaginatorListener = (state) => listener(state);
    this.listeners.add(entry);
    this.notify([entry]);
    this.drain();
    return () => {
      this.listeners.delete(entry);
    };
  }

  selectById(id: TopicId): void {
    this.dispatch({ type: "select", id });
  }

  advance(): void {
    this.dispatch({ type: "advance" });
  }

  retreat(): void {
    this.dispatch({ type: "retreat" });
  }

  /**
   * Applies an intent. When called from inside a listener, the intent is
   * queued and applied once every listener has seen the current snapshot.
   */
  dispatch(intent: PaginatorIntent): void {
    this.pending.push(intent);
    this.drain();
  }

  private drain() {
    if (this.notifyDepth > 0) return;

    let intent = this.pending.shift();
    while (intent) {
      const { next, ignored } = reduce(this.state, intent);
      if (ignored) this.logger.log?.(ignored);
      if (next !== this.state) {
        this.state = next;
        this.notify(Array.from(this.listeners));
      }
      intent = this.pending.shift();
    }
  }

  private notify(targets: PaginatorListener[]) {
    const snapshot = this.state;
    const failures: unknown[] = [];

    this.notifyDepth += 1;
    try {
      for (const listener of targets) {
        // Skip listeners removed by an earlier listener in this pass
        if (!this.listeners.has(listener)) continue;
        try {
          listener(snapshot);
        } catch (error) {
          failures.push(error);
        }
      }
    } finally {
      this.notifyDepth -= 1;
    }

    for (const error of failures) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error?.(`paginator listener failed: ${message}`);
    }
  }
}
