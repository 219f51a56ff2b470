// src/services/xml/xml-service.ts
import { parseStringPromise, processors } from 'xml2js';

/**
 * One <response> of a WebDAV multistatus body, reduced to its successful properties
 */
export interface DavResponse {
  href: string;
  /** Response-level status, present when the server reports one without propstat */
  status?: string;
  /** Properties from every propstat with a 2xx status, keyed by local name */
  props: Record<string, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * xml2js collapses single children into objects; this undoes that
 */
export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Text content of an element, whether xml2js produced a string or an object with attributes
 */
export function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isRecord(value) && typeof value._ === 'string') return value._;
  return undefined;
}

/**
 * Text of the <href> child of a property such as current-user-principal
 */
export function hrefOf(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  const first = asArray(value.href)[0];
  return textOf(first)?.trim();
}

/**
 * XML Service for parsing WebDAV responses.
 *
 * Namespace prefixes are stripped, so `d:href`, `D:href` and `href` all read as `href`.
 */
export class XmlService {
  async parse(xml: string): Promise<unknown> {
    const parsed: unknown = await parseStringPromise(xml, {
      explicitArray: false,
      tagNameProcessors: [processors.stripPrefix],
      attrNameProcessors: [processors.stripPrefix],
    });
    return parsed;
  }

  /**
   * Parses a 207 multistatus body into its responses
   */
  async parseMultistatus(xml: string): Promise<DavResponse[]> {
    if (!xml.trim()) return [];

    const document = await this.parse(xml);
    if (!isRecord(document) || !isRecord(document.multistatus)) {
      return [];
    }

    const responses: DavResponse[] = [];
    for (const entry of asArray(document.multistatus.response)) {
      if (!isRecord(entry)) continue;

      const href = textOf(asArray(entry.href)[0])?.trim();
      if (!href) continue;

      const props: Record<string, unknown> = {};
      for (const propstat of asArray(entry.propstat)) {
        if (!isRecord(propstat) || !isSuccess(textOf(propstat.status))) continue;
        if (isRecord(propstat.prop)) {
          Object.assign(props, propstat.prop);
        }
      }

      responses.push({ href, status: textOf(entry.status)?.trim(), props });
    }

    return responses;
  }
}

function isSuccess(status: string | undefined): boolean {
  // A propstat without status is treated as successful; some servers omit it
  return status === undefined || /\s2\d\d\b/.test(status);
}
