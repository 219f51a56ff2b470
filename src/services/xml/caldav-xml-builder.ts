// src/services/xml/caldav-xml-builder.ts
import type { ComponentType, TimeRange } from '../../models/index.js';
import { formatUtcDateTime } from '../ical/calendar-codec.js';
import { escapeXml } from '../../utils/index.js';

const XML_HEADER = '<?xml version="1.0" encoding="utf-8" ?>';

/**
 * Builder for CalDAV XML requests
 */
export class CalDavXmlBuilder {
  /**
   * PROPFIND body asking for the authenticated user's principal
   */
  buildPrincipalRequest(): string {
    return `${XML_HEADER}
<d:propfind xmlns:d="DAV:">
  <d:prop>
    <d:current-user-principal />
  </d:prop>
</d:propfind>`;
  }

  /**
   * PROPFIND body asking a principal for its calendar home
   */
  buildCalendarHomeRequest(): string {
    return `${XML_HEADER}
<d:propfind xmlns:d="DAV:" xmlns:cal="urn:ietf:params:xml:ns:caldav">
  <d:prop>
    <cal:calendar-home-set />
  </d:prop>
</d:propfind>`;
  }

  /**
   * Builds a PROPFIND request XML for calendar discovery
   */
  buildPropfindRequest(): string {
    return `${XML_HEADER}
<d:propfind xmlns:d="DAV:" xmlns:cal="urn:ietf:params:xml:ns:caldav"
    xmlns:cs="http://calendarserver.org/ns/" xmlns:oc="http://owncloud.org/ns"
    xmlns:ic="http://apple.com/ns/ical/">
  <d:prop>
    <d:resourcetype />
    <d:displayname />
    <cal:supported-calendar-component-set />
    <cs:getctag />
    <oc:calendar-enabled />
    <d:current-user-privilege-set />
    <ic:calendar-color />
  </d:prop>
</d:propfind>`;
  }

  /**
   * Builds a calendar-query REPORT for one component type, optionally limited to a time range
   */
  buildCalendarQueryReport(component: ComponentType, timeRange?: TimeRange): string {
    const range = timeRange
      ? `\n        <cal:time-range start="${formatUtcDateTime(timeRange.start)}" end="${formatUtcDateTime(timeRange.end)}" />`
      : '';

    return `${XML_HEADER}
<cal:calendar-query xmlns:d="DAV:" xmlns:cal="urn:ietf:params:xml:ns:caldav">
  <d:prop>
    <d:getetag />
    <cal:calendar-data />
  </d:prop>
  <cal:filter>
    <cal:comp-filter name="VCALENDAR">
      <cal:comp-filter name="${component}">${range}
      </cal:comp-filter>
    </cal:comp-filter>
  </cal:filter>
</cal:calendar-query>`;
  }

  /**
   * Builds a calendar-query REPORT locating an object by its UID
   */
  buildUidQueryReport(component: ComponentType, uid: string): string {
    return `${XML_HEADER}
<cal:calendar-query xmlns:d="DAV:" xmlns:cal="urn:ietf:params:xml:ns:caldav">
  <d:prop>
    <d:getetag />
    <cal:calendar-data />
  </d:prop>
  <cal:filter>
    <cal:comp-filter name="VCALENDAR">
      <cal:comp-filter name="${component}">
        <cal:prop-filter name="UID">
          <cal:text-match collation="i;octet">${escapeXml(uid)}</cal:text-match>
        </cal:prop-filter>
      </cal:comp-filter>
    </cal:comp-filter>
  </cal:filter>
</cal:calendar-query>`;
  }
}
