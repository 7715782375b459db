/**
 * Tests for Org note parsing and link extraction
 */

import { describe, it, expect } from 'vitest';
import {
  parseOrgNodes,
  extractLinks,
  attachmentNames,
} from '../src/org.js';

const GARDEN_NOTE = `#+title: Garden Log
:PROPERTIES:
:ID:      aa11-bb22
:END:

Planted tomatoes. See [[attachment:bed.jpg]].

* Pests
:PROPERTIES:
:ID:      cc33-dd44
:END:

Aphids again, compare with [[id:aa11-bb22][Garden Log]].
[[file:./spray.pdf]] and [[file:/tmp/other.pdf]] and [[https://example.com][site]]

* Untracked heading
Nothing to see here [[attachment:ignored.png]].

** Deep
:PROPERTIES:
:ID: ee55
:END:
Last line.`;

describe('parseOrgNodes', () => {
  const nodes = parseOrgNodes(GARDEN_NOTE);

  it('should return one node per ID-bearing section', () => {
    expect(nodes.map(n => n.id)).toEqual(['aa11-bb22', 'cc33-dd44', 'ee55']);
  });

  it('should build the file-level node from #+title and the first drawer', () => {
    expect(nodes[0]).toMatchObject({
      title: 'Garden Log',
      level: 0,
      properties: { ID: 'aa11-bb22' },
      body: '\nPlanted tomatoes. See [[attachment:bed.jpg]].\n\n',
      attachments: ['bed.jpg'],
    });
  });

  it('should use heading stars as the level', () => {
    expect(nodes[1].title).toBe('Pests');
    expect(nodes[1].level).toBe(1);
    expect(nodes[2].title).toBe('Deep');
    expect(nodes[2].level).toBe(2);
  });

  it('should collect links and file attachments under a heading', () => {
    expect(nodes[1].links).toEqual([
      { kind: 'id', id: 'aa11-bb22', description: 'Garden Log' },
      { kind: 'file', path: './spray.pdf' },
      { kind: 'file', path: '/tmp/other.pdf' },
      { kind: 'other', target: 'https://example.com', description: 'site' },
    ]);
    expect(nodes[1].attachments).toEqual(['./spray.pdf']);
  });

  it('should drop headings without an ID and their bodies', () => {
    const allAttachments = nodes.flatMap(n => n.attachments);
    expect(allAttachments).not.toContain('ignored.png');
    expect(nodes[1].body).not.toContain('Nothing to see here');
  });

  it('should keep a final body without trailing newline', () => {
    expect(nodes[2].body).toBe('Last line.');
  });

  it('should fall back to Untitled when the file has no title', () => {
    const [node] = parseOrgNodes(':PROPERTIES:\n:ID: x1\n:END:\nBody\n');
    expect(node.title).toBe('Untitled');
    expect(node.body).toBe('Body\n');
  });

  it('should match #+TITLE case-insensitively', () => {
    const [node] = parseOrgNodes('#+TITLE: Shout\n:PROPERTIES:\n:ID: x2\n:END:\n');
    expect(node.title).toBe('Shout');
  });

  it('should skip the file-level node when the preamble has no ID', () => {
    const nodes = parseOrgNodes('#+title: Loose\n\n* Kept\n:PROPERTIES:\n:ID: k1\n:END:\ntext\n');
    expect(nodes).toHaveLength(1);
    expect(nodes[0]).toMatchObject({ id: 'k1', title: 'Kept', level: 1, body: 'text\n' });
  });

  it('should return no nodes for empty content', () => {
    expect(parseOrgNodes('')).toEqual([]);
  });
});

describe('extractLinks', () => {
  it('should classify link targets in order', () => {
    const links = extractLinks('[[attachment:a.png]] then [[id:123][One]] then [[file:x.org]]');
    expect(links).toEqual([
      { kind: 'attachment', name: 'a.png' },
      { kind: 'id', id: '123', description: 'One' },
      { kind: 'file', path: 'x.org' },
    ]);
  });

  it('should ignore single-bracket text', () => {
    expect(extractLinks('[not a link] and [also][not]')).toEqual([]);
  });
});

describe('attachmentNames', () => {
  it('should keep attachment links and local file links only', () => {
    const names = attachmentNames(extractLinks(
      '[[attachment:a.png]] [[file:attachments/b.pdf]] [[file:./c.txt]] [[file:../d.txt]] [[id:e]]'
    ));
    expect(names).toEqual(['a.png', 'attachments/b.pdf', './c.txt']);
  });
});
