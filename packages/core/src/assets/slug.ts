const MAX_SLUG_LENGTH = 50;

/**
 * Filesystem-safe topic name.
 *
 * @example slugifyTopic("The History of Espresso") // "the_history_of_espresso"
 */
export function slugifyTopic(topic: string): string {
  return topic
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .replace(/\s+/g, "_")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}
