// src/services/ical/ical-lines.ts

/**
 * A content line: NAME;PARAM=VALUE:value
 */
export interface ICalProperty {
  name: string;
  params: Record<string, string>;
  value: string;
}

export interface ICalComponent {
  name: string;
  properties: ICalProperty[];
  components: ICalComponent[];
}

const MAX_LINE_OCTETS = 75;

/**
 * Escape text for iCalendar format
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_, char: string) =>
    char === 'n' || char === 'N' ? '\n' : char,
  );
}

/**
 * Splits a line into chunks of at most 75 octets, continuation lines start with a space
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const parts: string[] = [];
  let current = '';
  let size = 0;
  for (const char of line) {
    const charSize = Buffer.byteLength(char, 'utf8');
    // Continuation lines lose one octet to the leading space
    const limit = parts.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
    if (size + charSize > limit) {
      parts.push(current);
      current = '';
      size = 0;
    }
    current += char;
    size += charSize;
  }
  parts.push(current);
  return parts.join('\r\n ');
}

/**
 * Joins folded continuation lines and drops blank lines
 */
export function unfoldLines(text: string): string[] {
  const lines: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    if ((raw.startsWith(' ') || raw.startsWith('\t')) && lines.length > 0) {
      lines[lines.length - 1] += raw.slice(1);
    } else if (raw.trim() !== '') {
      lines.push(raw);
    }
  }
  return lines;
}

/**
 * Parses one unfolded content line. Returns null for lines without a value separator.
 */
export function parseProperty(line: string): ICalProperty | null {
  let inQuotes = false;
  let separator = -1;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') inQuotes = !inQuotes;
    if (char === ':' && !inQuotes) {
      separator = i;
      break;
    }
  }
  if (separator < 0) return null;

  const head = line.slice(0, separator);
  const value = line.slice(separator + 1);
  const segments = splitOutsideQuotes(head, ';');
  const name = segments[0].trim().toUpperCase();
  const params: Record<string, string> = {};

  for (const segment of segments.slice(1)) {
    const eq = segment.indexOf('=');
    if (eq < 0) continue;
    const key = segment.slice(0, eq).trim().toUpperCase();
    params[key] = segment.slice(eq + 1).replace(/^"(.*)"$/, '$1');
  }

  return { name, params, value };
}

/**
 * Parses iCalendar text into a component tree rooted at a synthetic "ROOT" component
 */
export function parseComponents(text: string): ICalComponent {
  const root: ICalComponent = { name: 'ROOT', properties: [], components: [] };
  const stack: ICalComponent[] = [root];

  for (const line of unfoldLines(text)) {
    const property = parseProperty(line);
    if (!property) continue;
    const current = stack[stack.length - 1];

    if (property.name === 'BEGIN') {
      const child: ICalComponent = {
        name: property.value.trim().toUpperCase(),
        properties: [],
        components: [],
      };
      current.components.push(child);
      stack.push(child);
    } else if (property.name === 'END') {
      if (stack.length > 1) stack.pop();
    } else {
      current.properties.push(property);
    }
  }

  return root;
}

/**
 * Depth-first search for components with one of the given names
 */
export function findComponents(root: ICalComponent, names: string[]): ICalComponent[] {
  const found: ICalComponent[] = [];
  for (const child of root.components) {
    if (names.includes(child.name)) {
      found.push(child);
    } else {
      found.push(...findComponents(child, names));
    }
  }
  return found;
}

export function firstProperty(component: ICalComponent, name: string): ICalProperty | undefined {
  return component.properties.find((property) => property.name === name);
}

/**
 * Puts a property in place of every property with its name, at the position of the first one
 */
export function replaceProperty(component: ICalComponent, property: ICalProperty): void {
  const index = component.properties.findIndex((current) => current.name === property.name);
  if (index < 0) {
    component.properties.push(property);
    return;
  }
  removeProperties(component, property.name);
  component.properties.splice(index, 0, property);
}

export function removeProperties(component: ICalComponent, name: string): void {
  component.properties = component.properties.filter((property) => property.name !== name);
}

/**
 * Writes one content line, quoting parameter values that contain separators
 */
export function formatProperty(property: ICalProperty): string {
  const params = Object.entries(property.params)
    .map(([key, value]) => `;${key}=${/[:;,]/.test(value) ? `"${value}"` : value}`)
    .join('');
  return `${property.name}${params}:${property.value}`;
}

export function serializeComponent(component: ICalComponent): string[] {
  return [
    `BEGIN:${component.name}`,
    ...component.properties.map(formatProperty),
    ...component.components.flatMap(serializeComponent),
    `END:${component.name}`,
  ];
}

/**
 * Serializes the components under a parsed root as folded CRLF text
 */
export function serializeCalendar(root: ICalComponent): string {
  const lines = root.components.flatMap(serializeComponent);
  return lines.map(foldLine).join('\r\n') + '\r\n';
}

function splitOutsideQuotes(value: string, delimiter: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const char of value) {
    if (char === '"') inQuotes = !inQuotes;
    if (char === delimiter && !inQuotes) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);
  return parts;
}
