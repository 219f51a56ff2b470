// tests/helpers/fake-dav.ts
import axios, {
  AxiosError,
  CanceledError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { escapeXml } from '../../src/utils/index.js';

export const SERVER_URL = 'https://dav.example.test/dav/';
export const PRINCIPAL_PATH = '/dav/principals/tester/';
export const HOME_PATH = '/dav/calendars/tester/';

export interface FakeCalendar {
  /** Path segment under the home, e.g. "work" */
  slug: string;
  displayName: string;
  components?: Array<'VEVENT' | 'VTODO'>;
  color?: string;
  readOnly?: boolean;
}

interface StoredObject {
  data: string;
  etag: string;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string;
}

const DAV_NS = 'xmlns:d="DAV:" xmlns:cal="urn:ietf:params:xml:ns:caldav" xmlns:cs="http://calendarserver.org/ns/" xmlns:ic="http://apple.com/ns/ical/"';

/**
 * In-process CalDAV server behind an axios adapter.
 *
 * Supports the discovery PROPFINDs, calendar-query REPORTs (component and UID
 * filters; time ranges are recorded but not applied), conditional PUT and DELETE.
 */
export class FakeDavServer {
  readonly calendars: FakeCalendar[] = [];
  readonly objects = new Map<string, StoredObject>();
  readonly requests: RecordedRequest[] = [];
  /** Forced status per absolute URL, applied before any other handling */
  readonly statusOverrides = new Map<string, number>();
  /** URLs whose requests fail with a network error */
  readonly networkFailures = new Set<string>();
  /** URLs whose requests fail as if the client timeout elapsed */
  readonly timeouts = new Set<string>();
  /** URLs whose requests never answer; they settle only when their signal aborts */
  readonly stalled = new Set<string>();
  principalSupported = true;
  private etagCounter = 0;

  constructor(calendars: FakeCalendar[] = []) {
    this.calendars.push(...calendars);
  }

  /**
   * axios instance whose requests are answered by this server
   */
  client(): AxiosInstance {
    return axios.create({ adapter: (config) => this.handle(config) });
  }

  calendarUrl(slug: string): string {
    return new URL(`${HOME_PATH}${slug}/`, SERVER_URL).toString();
  }

  /**
   * Stores a raw iCalendar object directly, bypassing PUT
   */
  seed(slug: string, name: string, data: string): string {
    const url = new URL(name, this.calendarUrl(slug)).toString();
    this.objects.set(url, { data, etag: this.nextEtag() });
    return url;
  }

  objectsIn(slug: string): Array<[string, StoredObject]> {
    const prefix = this.calendarUrl(slug);
    return [...this.objects.entries()].filter(([url]) => url.startsWith(prefix));
  }

  requestsFor(method: string): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method);
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse<string>> {
    const method = (config.method ?? 'get').toUpperCase();
    const url = config.url ?? '';
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(config.headers.toJSON())) {
      if (typeof value === 'string') headers[key.toLowerCase()] = value;
    }
    const body = typeof config.data === 'string' ? config.data : '';
    this.requests.push({ method, url, headers, body });

    if (config.signal?.aborted) {
      throw new CanceledError('canceled');
    }
    if (this.networkFailures.has(url)) {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
    }
    if (this.timeouts.has(url)) {
      throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, 'ECONNABORTED', config);
    }
    if (this.stalled.has(url)) {
      return stall(config);
    }

    const forced = this.statusOverrides.get(url);
    if (forced !== undefined) return respond(config, forced, '');

    switch (method) {
      case 'PROPFIND':
        return this.propfind(config, url, headers.depth, body);
      case 'REPORT':
        return this.report(config, url, body);
      case 'PUT':
        return this.put(config, url, headers, body);
      case 'DELETE':
        return this.delete(config, url, headers);
      default:
        return respond(config, 405, '');
    }
  }

  private propfind(
    config: InternalAxiosRequestConfig,
    url: string,
    depth: string | undefined,
    body: string,
  ): AxiosResponse<string> {
    if (depth === '0' && body.includes('current-user-principal')) {
      if (!this.principalSupported) return respond(config, 404, '');
      return respond(
        config,
        207,
        multistatus([
          propResponse(url, `<d:current-user-principal><d:href>${PRINCIPAL_PATH}</d:href></d:current-user-principal>`),
        ]),
      );
    }

    if (depth === '0' && body.includes('calendar-home-set')) {
      return respond(
        config,
        207,
        multistatus([
          propResponse(url, `<cal:calendar-home-set><d:href>${HOME_PATH}</d:href></cal:calendar-home-set>`),
        ]),
      );
    }

    const responses = [propResponse(HOME_PATH, '<d:resourcetype><d:collection/></d:resourcetype>')];
    for (const calendar of this.calendars) {
      const components = (calendar.components ?? ['VEVENT', 'VTODO'])
        .map((name) => `<cal:comp name="${name}"/>`)
        .join('');
      const privileges = calendar.readOnly
        ? '<d:privilege><d:read/></d:privilege>'
        : '<d:privilege><d:read/></d:privilege><d:privilege><d:write/></d:privilege>';
      const color = calendar.color ? `<ic:calendar-color>${calendar.color}</ic:calendar-color>` : '';
      responses.push(
        propResponse(
          `${HOME_PATH}${calendar.slug}/`,
          '<d:resourcetype><d:collection/><cal:calendar/></d:resourcetype>' +
            `<d:displayname>${escapeXml(calendar.displayName)}</d:displayname>` +
            `<cal:supported-calendar-component-set>${components}</cal:supported-calendar-component-set>` +
            `<cs:getctag>ctag-${calendar.slug}</cs:getctag>` +
            `<d:current-user-privilege-set>${privileges}</d:current-user-privilege-set>` +
            color,
        ),
      );
    }
    return respond(config, 207, multistatus(responses));
  }

  private report(config: InternalAxiosRequestConfig, url: string, body: string): AxiosResponse<string> {
    const component = /comp-filter name="(VEVENT|VTODO)"/.exec(body)?.[1];
    const uidMatch = /<cal:text-match[^>]*>([^<]*)<\/cal:text-match>/.exec(body);
    const uid = uidMatch ? unescapeXml(uidMatch[1]) : undefined;

    const responses: string[] = [];
    for (const [objectUrl, stored] of this.objects) {
      if (!objectUrl.startsWith(url)) continue;
      if (component && !stored.data.includes(`BEGIN:${component}`)) continue;
      if (uid !== undefined && !stored.data.includes(`UID:${uid}`)) continue;
      responses.push(
        propResponse(
          new URL(objectUrl).pathname,
          `<d:getetag>${escapeXml(stored.etag)}</d:getetag>` +
            `<cal:calendar-data>${escapeXml(stored.data)}</cal:calendar-data>`,
        ),
      );
    }
    return respond(config, 207, multistatus(responses));
  }

  private put(
    config: InternalAxiosRequestConfig,
    url: string,
    headers: Record<string, string>,
    body: string,
  ): AxiosResponse<string> {
    const existing = this.objects.get(url);
    if (headers['if-none-match'] === '*' && existing) return respond(config, 412, '');
    if (headers['if-match'] && headers['if-match'] !== existing?.etag) return respond(config, 412, '');

    const etag = this.nextEtag();
    this.objects.set(url, { data: body, etag });
    return respond(config, existing ? 204 : 201, '', { etag });
  }

  private delete(
    config: InternalAxiosRequestConfig,
    url: string,
    headers: Record<string, string>,
  ): AxiosResponse<string> {
    const existing = this.objects.get(url);
    if (!existing) return respond(config, 404, '');
    if (headers['if-match'] && headers['if-match'] !== existing.etag) return respond(config, 412, '');
    this.objects.delete(url);
    return respond(config, 204, '');
  }

  private nextEtag(): string {
    this.etagCounter += 1;
    return `"etag-${this.etagCounter}"`;
  }
}

function stall(config: InternalAxiosRequestConfig): Promise<never> {
  return new Promise((_resolve, reject) => {
    const signal = config.signal;
    if (!signal?.addEventListener) {
      reject(new Error('A stalled request needs an abort signal'));
      return;
    }
    signal.addEventListener('abort', () => reject(new CanceledError('canceled')));
  });
}

function respond(
  config: InternalAxiosRequestConfig,
  status: number,
  data: string,
  headers: Record<string, string> = {},
): AxiosResponse<string> {
  return { data, status, statusText: String(status), headers, config, request: {} };
}

function multistatus(responses: string[]): string {
  return `<?xml version="1.0" encoding="utf-8"?>\n<d:multistatus ${DAV_NS}>${responses.join('')}</d:multistatus>`;
}

function propResponse(href: string, props: string): string {
  return (
    `<d:response><d:href>${href}</d:href>` +
    `<d:propstat><d:prop>${props}</d:prop><d:status>HTTP/1.1 200 OK</d:status></d:propstat>` +
    '</d:response>'
  );
}

function unescapeXml(value: string): string {
  return value
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Builds a minimal VCALENDAR around the given component lines
 */
export function ics(component: 'VEVENT' | 'VTODO', lines: string[]): string {
  return ['BEGIN:VCALENDAR', 'VERSION:2.0', `BEGIN:${component}`, ...lines, `END:${component}`, 'END:VCALENDAR', '']
    .join('\r\n');
}
