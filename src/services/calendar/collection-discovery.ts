// src/services/calendar/collection-discovery.ts
import { CalendarUtils, type CalendarCollection, type ComponentType } from '../../models/index.js';
import { asArray, hrefOf, isRecord, textOf, type DavResponse, type XmlService } from '../xml/xml-service.js';
import type { CalDavXmlBuilder } from '../xml/caldav-xml-builder.js';
import { ensureSuccess, type HttpClient } from './http-client.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('collection-discovery');

const KNOWN_COMPONENTS: ComponentType[] = ['VEVENT', 'VTODO'];

/**
 * Source of the calendar collections visible to the configured account
 */
export interface CollectionSource {
  discover(): Promise<CalendarCollection[]>;
}

/**
 * Discovers calendars by walking principal → calendar-home-set → collections.
 * Servers that do not answer the principal lookup are treated as if the
 * configured URL were the calendar home.
 */
export class CollectionDiscovery implements CollectionSource {
  constructor(
    private readonly http: HttpClient,
    private readonly xml: XmlService,
    private readonly builder: CalDavXmlBuilder,
  ) {}

  /**
   * Get a list of all calendars for the user
   */
  async discover(): Promise<CalendarCollection[]> {
    const homeUrl = await this.findCalendarHome();
    const result = ensureSuccess(
      await this.http.propfind(homeUrl, 1, this.builder.buildPropfindRequest()),
      'Calendar home',
    );
    const responses = await this.xml.parseMultistatus(result.data);

    const calendars: CalendarCollection[] = [];
    for (const response of responses) {
      const url = withTrailingSlash(this.http.resolveUrl(response.href));
      // Skip the home collection itself
      if (url === homeUrl) continue;

      const calendar = this.toCollection(response, url);
      if (calendar) calendars.push(calendar);
    }

    logger.info(`Discovered ${calendars.length} calendar(s) under ${homeUrl}`);
    return calendars;
  }

  private async findCalendarHome(): Promise<string> {
    const serverUrl = withTrailingSlash(this.http.baseUrl);

    const principal = await this.findHref(serverUrl, this.builder.buildPrincipalRequest(), 'current-user-principal');
    if (!principal) {
      return serverUrl;
    }

    const home = await this.findHref(principal, this.builder.buildCalendarHomeRequest(), 'calendar-home-set');
    return home ?? serverUrl;
  }

  /**
   * Reads an href-valued property with a depth-0 PROPFIND; undefined when unavailable
   */
  private async findHref(url: string, body: string, property: string): Promise<string | undefined> {
    const result = await this.http.propfind(url, 0, body);
    if (result.status !== 207) {
      logger.debug(`PROPFIND ${property} on ${url} returned ${result.status}`);
      return undefined;
    }

    const responses = await this.xml.parseMultistatus(result.data);
    for (const response of responses) {
      const href = hrefOf(response.props[property]);
      if (href) return withTrailingSlash(this.http.resolveUrl(href));
    }
    return undefined;
  }

  private toCollection(response: DavResponse, url: string): CalendarCollection | null {
    const { props } = response;

    // Only process items that are calendars
    if (!isRecord(props.resourcetype) || !('calendar' in props.resourcetype)) {
      return null;
    }

    // Skip disabled calendars if the property exists
    if (textOf(props['calendar-enabled'])?.trim() === '0') {
      return null;
    }

    const id = CalendarUtils.idFromUrl(url);
    const displayName = textOf(props.displayname)?.trim() || id;

    return {
      id,
      displayName,
      url,
      components: parseComponentSet(props['supported-calendar-component-set']),
      color: parseColor(props['calendar-color']),
      ctag: textOf(props.getctag)?.trim(),
      readOnly: parseReadOnly(props['current-user-privilege-set']),
    };
  }
}

/**
 * Servers that do not advertise a component set accept both events and todos
 */
function parseComponentSet(value: unknown): ComponentType[] {
  if (!isRecord(value)) return [...KNOWN_COMPONENTS];

  const names = asArray(value.comp)
    .map((comp) => (isRecord(comp) && isRecord(comp.$) ? comp.$.name : undefined))
    .filter((name): name is string => typeof name === 'string')
    .map((name) => name.toUpperCase());

  const components = KNOWN_COMPONENTS.filter((component) => names.includes(component));
  return names.length === 0 ? [...KNOWN_COMPONENTS] : components;
}

function parseColor(value: unknown): string | undefined {
  const color = textOf(value)?.trim();
  if (!color) return undefined;
  // Extract color (strip quotes if present)
  return color.replace(/^"(.*)"$/, '$1');
}

/**
 * A calendar is read-only when the server lists privileges and none of them grants writing
 */
function parseReadOnly(value: unknown): boolean {
  if (!isRecord(value)) return false;

  const privileges = asArray(value.privilege).filter(isRecord);
  if (privileges.length === 0) return false;

  return !privileges.some(
    (privilege) => 'write' in privilege || 'write-content' in privilege || 'all' in privilege,
  );
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}
