import type { PaginatorState } from '@featuretour/core';
import type { FeaturePaginator } from '@featuretour/paginator';
import type { QueryClient } from '@tanstack/query-core';

export const DEFAULT_PAGINATOR_QUERY_KEY = ['paginator'] as const;

export type WirePaginatorQueryOptions = {
  /**
   * TanStack QueryClient instance.
   */
  queryClient: QueryClient;

  /**
   * The paginator to mirror.
   * Alternatively provide `subscribe` directly (useful for testing).
   */
  paginator?: Pick<FeaturePaginator, 'subscribe'>;

  subscribe?: (listener: (state: PaginatorState) => void) => () => void;

  /**
   * Cache key the snapshot is written under.
   * @default ['paginator']
   */
  queryKey?: readonly unknown[];
};

/**
 * Mirror paginator snapshots into a TanStack Query cache.
 *
 * Every snapshot, including the one delivered on subscription, is written with
 * `setQueryData`, so any query observer on the same key renders the current
 * state without a fetch.
 *
 * @example
 * ```ts
 * const cleanup = wirePaginatorQuery({ queryClient, paginator });
 *
 * const observer = new QueryObserver(queryClient, {
 *   queryKey: ['paginator'],
 *   enabled: false,
 * });
 *
 * // Later: cleanup() to unsubscribe
 * ```
 *
 * @returns Cleanup function to stop mirroring
 */
export function wirePaginatorQuery(opts: WirePaginatorQueryOptions): () => void {
  const {
    queryClient,
    paginator,
    queryKey = DEFAULT_PAGINATOR_QUERY_KEY,
  } = opts;

  const subscribe =
    opts.subscribe ?? paginator?.subscribe.bind(paginator);
  if (!subscribe) {
    throw new Error(
      'wirePaginatorQuery: either `paginator` or `subscribe` callback is required',
    );
  }

  return subscribe((state) => {
    queryClient.setQueryData<PaginatorState>(queryKey, state);
  });
}

/**
 * Read the mirrored snapshot, if one has been written.
 */
export function getPaginatorQueryData(
  queryClient: QueryClient,
  queryKey: readonly unknown[] = DEFAULT_PAGINATOR_QUERY_KEY,
): PaginatorState | undefined {
  return queryClient.getQueryData<PaginatorState>(queryKey);
}

export type { QueryClient } from '@tanstack/query-core';
