// src/services/calendar/calendar-router.ts
import {
  CalendarUtils,
  type CalendarCollection,
  type CalendarItem,
  type SearchQuery,
} from '../../models/index.js';
import {
  AmbiguousCalendarReferenceError,
  CalendarNotFoundError,
  toToolFailure,
  type CalendarErrorKind,
} from '../../utils/errors.js';
import { mapInChunks } from '../../utils/concurrency.js';
import { createLogger } from '../../utils/logger.js';
import type { CalendarAdapter } from './caldav-adapter.js';
import type { CollectionSource } from './collection-discovery.js';
import type { CollectionCache, CollectionSnapshot } from './collection-cache.js';

const logger = createLogger('calendar-router');

export type AdapterFactory = (collection: CalendarCollection) => CalendarAdapter;

/**
 * A calendar that could not contribute to a fan-out search
 */
export interface CollectionFailure {
  calendar: string;
  kind: CalendarErrorKind;
  message: string;
}

export interface FanOutResult {
  items: CalendarItem[];
  failures: CollectionFailure[];
}

type CollectionOutcome =
  | { ok: true; items: CalendarItem[] }
  | { ok: false; failure: CollectionFailure };

/**
 * Resolves calendar references and fans searches out across collections
 */
export class CalendarRouter {
  constructor(
    private readonly source: CollectionSource,
    private readonly adapterFactory: AdapterFactory,
    private readonly cache: CollectionCache,
    private readonly concurrency: number,
  ) {}

  async listCollections(options: { refresh?: boolean } = {}): Promise<CollectionSnapshot> {
    return this.cache.load(() => this.source.discover(), { force: options.refresh });
  }

  async refresh(): Promise<CollectionSnapshot> {
    return this.listCollections({ refresh: true });
  }

  /**
   * Maps a reference (id, URL or display name) to exactly one collection.
   * A miss triggers one rediscovery before failing.
   */
  async resolve(reference: string): Promise<CalendarCollection> {
    const wasCached = this.cache.get() !== undefined;
    const collections = await this.listCollections();

    const match = findCollection(collections, reference);
    if (match) return match;

    if (wasCached) {
      logger.debug(`Calendar '${reference}' not in cached set, rediscovering`);
      const refreshed = await this.refresh();
      const retried = findCollection(refreshed, reference);
      if (retried) return retried;
    }

    throw new CalendarNotFoundError(reference);
  }

  adapterFor(collection: CalendarCollection): CalendarAdapter {
    return this.adapterFactory(collection);
  }

  /**
   * Queries every targeted collection and merges the results in collection order.
   * A failing collection is reported in `failures` and never hides the others' items.
   */
  async fanOutSearch(query: SearchQuery, signal?: AbortSignal): Promise<FanOutResult> {
    const failures: CollectionFailure[] = [];
    const targets: CalendarCollection[] = [];

    if (query.calendars && query.calendars.length > 0) {
      for (const reference of query.calendars) {
        try {
          const collection = await this.resolve(reference);
          if (!targets.some((target) => target.url === collection.url)) {
            targets.push(collection);
          }
        } catch (error) {
          failures.push({ calendar: reference, ...toToolFailure(error) });
        }
      }
    } else {
      targets.push(...(await this.listCollections()));
    }

    const searchable = targets.filter((collection) => CalendarUtils.supports(collection, query.type));

    const outcomes = await mapInChunks<CalendarCollection, CollectionOutcome>(
      searchable,
      this.concurrency,
      async (collection) => {
        try {
          const items: CalendarItem[] = [];
          for await (const item of this.adapterFor(collection).query(query, { signal })) {
            items.push(item);
          }
          return { ok: true, items };
        } catch (error) {
          const failure = toToolFailure(error);
          logger.warn(`Search in '${collection.displayName}' failed: ${failure.message}`);
          return { ok: false, failure: { calendar: collection.displayName, ...failure } };
        }
      },
    );

    const items: CalendarItem[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        items.push(...outcome.items);
      } else {
        failures.push(outcome.failure);
      }
    }

    return {
      items: query.limit !== undefined ? items.slice(0, query.limit) : items,
      failures,
    };
  }
}

function findCollection(
  collections: CollectionSnapshot,
  reference: string,
): CalendarCollection | undefined {
  const trimmed = reference.trim();

  const byId = collections.find((collection) => collection.id === trimmed);
  if (byId) return byId;

  const byUrl = collections.find(
    (collection) => collection.url === trimmed || collection.url === `${trimmed}/`,
  );
  if (byUrl) return byUrl;

  const needle = trimmed.toLowerCase();
  const byName = collections.filter((collection) => collection.displayName.toLowerCase() === needle);
  if (byName.length > 1) {
    throw new AmbiguousCalendarReferenceError(
      reference,
      byName.map((collection) => collection.id),
    );
  }
  return byName[0];
}
