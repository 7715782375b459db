/**
 * Org-mode note primitives
 *
 * Splits an Org-roam file into ID-bearing nodes (the file itself plus any
 * heading with its own :ID: drawer) and extracts the link markers each node
 * carries. Only the subset of Org syntax that Org-roam notes rely on is
 * understood: #+title, property drawers, headings and [[...]] links.
 */

/** A link marker found in note text */
export type OrgLink =
  | { kind: 'attachment'; name: string; description?: string }
  | { kind: 'id'; id: string; description?: string }
  | { kind: 'file'; path: string; description?: string }
  | { kind: 'other'; target: string; description?: string };

/** A note (file-level or heading-level) identified by its :ID: property */
export interface OrgNode {
  id: string;
  title: string;
  /** 0 for the file-level node, otherwise the number of heading stars */
  level: number;
  properties: Record<string, string>;
  body: string;
  /** Attachment names referenced from this node's body */
  attachments: string[];
  links: OrgLink[];
}

const TITLE_PATTERN = /^\s*#\+title:\s*(.+)/i;
const HEADING_PATTERN = /^(\*+)\s+(.+)/;
const PROPERTY_PATTERN = /^:([^:]+):\s*(.+)$/;
const LINK_PATTERN = /\[\[([^\]]+)\](?:\[([^\]]*)\])?\]/g;

const DRAWER_START = ':PROPERTIES:';
const DRAWER_END = ':END:';

/**
 * Extract every [[target]] / [[target][description]] marker, in order.
 */
export function extractLinks(text: string): OrgLink[] {
  const links: OrgLink[] = [];

  for (const match of text.matchAll(LINK_PATTERN)) {
    const target = match[1];
    const description = match[2];
    const extra = description !== undefined ? { description } : {};

    if (target.startsWith('attachment:')) {
      links.push({ kind: 'attachment', name: target.slice('attachment:'.length), ...extra });
    } else if (target.startsWith('id:')) {
      links.push({ kind: 'id', id: target.slice('id:'.length), ...extra });
    } else if (target.startsWith('file:')) {
      links.push({ kind: 'file', path: target.slice('file:'.length), ...extra });
    } else {
      links.push({ kind: 'other', target, ...extra });
    }
  }

  return links;
}

/**
 * Attachment names a set of links points at.
 * file: links count only when they stay inside the note's attachment folder.
 */
export function attachmentNames(links: OrgLink[]): string[] {
  const names: string[] = [];
  for (const link of links) {
    if (link.kind === 'attachment') {
      names.push(link.name);
    } else if (link.kind === 'file' && (link.path.startsWith('attachments/') || link.path.startsWith('./'))) {
      names.push(link.path);
    }
  }
  return names;
}

function isDrawerLine(line: string, marker: string): boolean {
  return line.trim() === marker;
}

function readProperty(line: string): [string, string] | null {
  const match = PROPERTY_PATTERN.exec(line.trim());
  return match ? [match[1], match[2]] : null;
}

function makeNode(
  id: string,
  title: string,
  level: number,
  properties: Record<string, string>,
  bodyLines: string[]
): OrgNode {
  const body = bodyLines.join('');
  const links = extractLinks(body);
  return {
    id,
    title,
    level,
    properties,
    body,
    attachments: attachmentNames(links),
    links,
  };
}

/**
 * Split Org file content into ID-bearing nodes.
 *
 * The file-level node gets the #+title (or "Untitled") and the drawer that
 * precedes the first heading. Headings without an ID are dropped along with
 * their bodies.
 */
export function parseOrgNodes(content: string): OrgNode[] {
  const lines = content.split(/(?<=\n)/);
  const nodes: OrgNode[] = [];
  let index = 0;

  // File preamble: everything before the first heading
  let fileTitle: string | null = null;
  const fileProperties: Record<string, string> = {};
  let inDrawer = false;
  const preamble: string[] = [];

  while (index < lines.length) {
    const line = lines[index];
    const titleMatch = TITLE_PATTERN.exec(line);
    if (titleMatch) {
      fileTitle = titleMatch[1].trim();
    } else if (isDrawerLine(line, DRAWER_START)) {
      inDrawer = true;
    } else if (isDrawerLine(line, DRAWER_END)) {
      inDrawer = false;
    } else if (inDrawer) {
      const property = readProperty(line);
      if (property) fileProperties[property[0]] = property[1];
    } else if (HEADING_PATTERN.test(line)) {
      break;
    } else {
      preamble.push(line);
    }
    index++;
  }

  if (fileProperties.ID) {
    nodes.push(makeNode(fileProperties.ID, fileTitle ?? 'Untitled', 0, fileProperties, preamble));
  }

  // Headings
  let current: { id: string; title: string; level: number; properties: Record<string, string> } | null = null;
  let body: string[] = [];

  const flush = () => {
    if (current) {
      nodes.push(makeNode(current.id, current.title, current.level, current.properties, body));
    }
    current = null;
    body = [];
  };

  while (index < lines.length) {
    const heading = HEADING_PATTERN.exec(lines[index]);
    if (!heading) {
      if (current) body.push(lines[index]);
      index++;
      continue;
    }

    flush();
    index++;

    // Drawer must directly follow the heading line
    const properties: Record<string, string> = {};
    inDrawer = false;
    while (index < lines.length) {
      const line = lines[index];
      if (isDrawerLine(line, DRAWER_START)) {
        inDrawer = true;
      } else if (isDrawerLine(line, DRAWER_END)) {
        inDrawer = false;
      } else if (inDrawer) {
        const property = readProperty(line);
        if (property) properties[property[0]] = property[1];
      } else {
        break;
      }
      index++;
    }

    if (properties.ID) {
      current = { id: properties.ID, title: heading[2].trim(), level: heading[1].length, properties };
    }
  }

  flush();
  return nodes;
}
