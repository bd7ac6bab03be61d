/**
 * A single page of the feature tour.
 *
 * Topics are created once from a static catalog and never mutated.
 */
export type Topic = {
  readonly id: string;
  readonly title: string;
  readonly summary: string;
  readonly highlights: readonly string[];
  /**
   * Opaque display text, rendered verbatim (usually a short code sample).
   */
  readonly codeHint: string;
};

export type TopicId = Topic["id"];

/**
 * Returns the ids that occur more than once, in order of first repetition.
 */
export function findDuplicateIds(topics: readonly Topic[]): TopicId[] {
  const seen = new Set<TopicId>();
  const duplicates: TopicId[] = [];
  for (const topic of topics) {
    if (seen.has(topic.id) && !duplicates.includes(topic.id)) {
      duplicates.push(topic.id);
    }
    seen.add(topic.id);
  }
  return duplicates;
}
