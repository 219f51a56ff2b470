// src/services/calendar/caldav-adapter.ts
import {
  CalendarUtils,
  type CalendarCollection,
  type CalendarItem,
  type CalendarItemDraft,
  type ItemType,
  type SearchQuery,
  type WireObject,
} from '../../models/index.js';
import type { CalendarCodec } from '../ical/calendar-codec.js';
import type { CalDavXmlBuilder } from '../xml/caldav-xml-builder.js';
import { textOf, type XmlService } from '../xml/xml-service.js';
import { ensureSuccess, type HttpClient } from './http-client.js';
import {
  CalendarError,
  MalformedCalendarObjectError,
  NotFoundError,
  RemoteConflictError,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('caldav-adapter');

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ReadOptions extends CallOptions {
  /** Restricts the lookup to one component type; both are tried when omitted */
  type?: ItemType;
}

/**
 * Operations against a single calendar collection
 */
export interface CalendarAdapter {
  readonly collection: CalendarCollection;
  create(draft: CalendarItemDraft, options?: CallOptions): Promise<CalendarItem>;
  read(uid: string, options?: ReadOptions): Promise<CalendarItem>;
  /** Writes the item's fields over the stored object, keeping what the item does not model */
  update(uid: string, item: CalendarItem, options?: CallOptions): Promise<CalendarItem>;
  /** Returns the item as it was before deletion */
  delete(uid: string, options?: ReadOptions): Promise<CalendarItem>;
  /**
   * Lazily runs a calendar-query; iterating again re-issues the REPORT
   */
  query(query: SearchQuery, options?: CallOptions): AsyncIterable<CalendarItem>;
}

export interface CalDavAdapterDeps {
  http: HttpClient;
  xml: XmlService;
  builder: CalDavXmlBuilder;
  codec: CalendarCodec;
}

interface LocatedObject {
  wire: WireObject & { href: string };
  item: CalendarItem;
}

/**
 * CalDAV-backed adapter bound to one collection
 */
export class CalDavAdapter implements CalendarAdapter {
  private readonly http: HttpClient;
  private readonly xml: XmlService;
  private readonly builder: CalDavXmlBuilder;
  private readonly codec: CalendarCodec;

  constructor(
    readonly collection: CalendarCollection,
    deps: CalDavAdapterDeps,
  ) {
    this.http = deps.http;
    this.xml = deps.xml;
    this.builder = deps.builder;
    this.codec = deps.codec;
  }

  async create(draft: CalendarItemDraft, options: CallOptions = {}): Promise<CalendarItem> {
    const item = { ...this.codec.materialize(draft), calendarId: this.collection.id };
    const wire = this.codec.encode(item);
    const href = this.objectUrl(item.uid);

    const result = await this.http.put(href, wire.data, { ifNoneMatch: '*' }, options.signal);
    if (result.status === 412 || result.status === 409) {
      throw new RemoteConflictError(
        `An object with UID ${item.uid} already exists in calendar '${this.collection.displayName}'`,
        { uid: item.uid, calendar: this.collection.id },
      );
    }
    ensureSuccess(result, `Create ${item.type} ${item.uid}`);

    logger.debug(`Created ${item.type} ${item.uid} in ${this.collection.id}`);
    return item;
  }

  async read(uid: string, options: ReadOptions = {}): Promise<CalendarItem> {
    const located = await this.locate(uid, options);
    return located.item;
  }

  async update(uid: string, item: CalendarItem, options: CallOptions = {}): Promise<CalendarItem> {
    const existing = await this.locate(uid, { type: item.type, signal: options.signal });

    // Edits the stored object in place, so properties the item does not model survive
    const wire = this.codec.patch(existing.wire, item);

    const result = await this.http.put(
      existing.wire.href,
      wire.data,
      { ifMatch: existing.wire.etag },
      options.signal,
    );
    if (result.status === 404 || result.status === 410) {
      throw new NotFoundError(itemLabel(item.type), uid);
    }
    ensureSuccess(result, `Update ${item.type} ${uid}`);

    return this.codec.decode(wire, this.collection.id);
  }

  async delete(uid: string, options: ReadOptions = {}): Promise<CalendarItem> {
    const existing = await this.locate(uid, options);

    const result = await this.http.delete(existing.wire.href, existing.wire.etag, options.signal);
    if (result.status === 404 || result.status === 410) {
      throw new NotFoundError(itemLabel(existing.item.type), uid);
    }
    ensureSuccess(result, `Delete ${existing.item.type} ${uid}`);

    return existing.item;
  }

  async *query(query: SearchQuery, options: CallOptions = {}): AsyncGenerator<CalendarItem> {
    const component = CalendarUtils.componentFor(query.type);
    const objects = await this.report(this.builder.buildCalendarQueryReport(component, query.range), options);

    const items: CalendarItem[] = [];
    for (const wire of objects) {
      const item = this.tryDecode(wire);
      if (!item || item.type !== query.type) continue;
      if (query.text && !CalendarUtils.matchesText(item, query.text)) continue;
      if (query.status && item.type === 'todo' && item.status !== query.status) continue;
      items.push(item);
    }

    yield* items.sort((a, b) => sortKey(a) - sortKey(b));
  }

  /**
   * Finds the stored object for a UID together with its href and etag
   */
  private async locate(uid: string, options: ReadOptions): Promise<LocatedObject> {
    const types: ItemType[] = options.type ? [options.type] : ['event', 'todo'];
    let malformed: MalformedCalendarObjectError | undefined;

    for (const type of types) {
      const report = this.builder.buildUidQueryReport(CalendarUtils.componentFor(type), uid);
      const objects = await this.report(report, options);

      for (const wire of objects) {
        // Servers differ in how strictly they apply text-match; confirm the UID
        let item: CalendarItem;
        try {
          item = this.codec.decode(wire, this.collection.id);
        } catch (error) {
          if (!(error instanceof MalformedCalendarObjectError)) throw error;
          if (this.codec.uidOf(wire) === uid) malformed = error;
          else logger.warn(`Skipping ${wire.href} in ${this.collection.id}: ${error.message}`);
          continue;
        }
        if (item.uid === uid && item.type === type) {
          return { wire, item };
        }
      }
    }

    if (malformed) throw malformed;
    throw new NotFoundError(options.type ? itemLabel(options.type) : 'Calendar item', uid);
  }

  private async report(body: string, options: CallOptions): Promise<Array<WireObject & { href: string }>> {
    const result = ensureSuccess(
      await this.http.report(this.collection.url, 1, body, options.signal),
      `Calendar '${this.collection.displayName}'`,
    );
    const responses = await this.xml.parseMultistatus(result.data);

    const objects: Array<WireObject & { href: string }> = [];
    for (const response of responses) {
      const data = textOf(response.props['calendar-data']);
      if (!data) continue;
      objects.push({
        href: this.http.resolveUrl(response.href),
        etag: textOf(response.props.getetag)?.trim(),
        data,
      });
    }
    return objects;
  }

  private tryDecode(wire: WireObject): CalendarItem | undefined {
    try {
      return this.codec.decode(wire, this.collection.id);
    } catch (error) {
      if (!(error instanceof CalendarError)) throw error;
      logger.warn(`Skipping ${wire.href ?? 'object'} in ${this.collection.id}: ${error.message}`);
      return undefined;
    }
  }

  private objectUrl(uid: string): string {
    return new URL(`${encodeURIComponent(uid)}.ics`, this.collection.url).toString();
  }
}

function itemLabel(type: ItemType): string {
  return type === 'event' ? 'Event' : 'Todo';
}

function sortKey(item: CalendarItem): number {
  const when = item.type === 'event' ? item.start : (item.due ?? item.start);
  return when ? when.getTime() : Number.MAX_SAFE_INTEGER;
}
