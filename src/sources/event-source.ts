import { EventMeta } from '../types/event';

/**
 * Supplies the most recent event for the configured region.
 * Implementations reject with UpstreamFetchError when the feed cannot answer.
 */
export interface EventSource {
  fetchLatestEvent(): Promise<EventMeta>;
}
