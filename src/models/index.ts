// src/models/index.ts
import type { CalendarCollection, CalendarItem, ComponentType, ItemType } from './calendar.js';

export * from './calendar.js';
export * from './batch.js';
export * from './requests.js';
export * from './results.js';

/**
 * Helpers for working with calendar models
 */
export const CalendarUtils = {
  /**
   * Derives a collection id from its URL (last non-empty path segment)
   */
  idFromUrl(url: string): string {
    const segments = url.split('/').filter(Boolean);
    return decodeURIComponent(segments[segments.length - 1] ?? url);
  },

  componentFor(type: ItemType): ComponentType {
    return type === 'event' ? 'VEVENT' : 'VTODO';
  },

  supports(collection: CalendarCollection, type: ItemType): boolean {
    return collection.components.includes(CalendarUtils.componentFor(type));
  },

  /**
   * Case-insensitive free-text match against title and description
   */
  matchesText(item: CalendarItem, text: string): boolean {
    const needle = text.toLowerCase();
    return (
      item.title.toLowerCase().includes(needle) ||
      (item.description?.toLowerCase().includes(needle) ?? false)
    );
  },
};
