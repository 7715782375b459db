/**
 * The fakedata fixture — a two-note Org-roam repository with attachments.
 *
 * Key characteristics:
 * - 2 notes in data/, 4 ID-bearing nodes (each note has one heading with its own ID)
 * - Reciprocal [[id:...]] links between Note One and Note Two
 * - 3 empty attachment placeholders under attachments/<bucket>/<leaf>/
 * - Two leaves share the 00 bucket
 *
 * Note bodies are literal text so every build is byte-identical.
 */

export interface FixtureNote {
  /** Path relative to the fixture root */
  path: string;
  content: string;
}

export interface FixturePlaceholder {
  bucket: string;
  leaf: string;
  name: string;
}

export interface FixtureDefinition {
  dataDir: string;
  attachmentsDir: string;
  notes: FixtureNote[];
  placeholders: FixturePlaceholder[];
}

export const NOTE_ONE_ID = '87f4a3-a24c-4a96-938f-f00ef1f67ef3';
export const HEADING_ONE_ID = '8AADAE-AB7D-4A7C-9C64-C5DD95D1ACFA';
export const NOTE_TWO_ID = '5970E7-4DAD-4E87-9256-B1E63E4C2885';
export const SUBHEADING_ID = '7ab7a4-c880-4012-865c-4168c1c43aba';

export const NOTE_ONE = `#+title: Note One
:PROPERTIES:
:ID:      87f4a3-a24c-4a96-938f-f00ef1f67ef3
:END:

This is a test note with an attachment.

[[attachment:attachment1.png]]

* Heading One
:PROPERTIES:
:ID:      8AADAE-AB7D-4A7C-9C64-C5DD95D1ACFA
:END:

Content under heading one with its own attachment.

[[attachment:attachment2.pdf]]

Link to [[id:5970E7-4DAD-4E87-9256-B1E63E4C2885][Note Two]].
`;

export const NOTE_TWO = `#+title: Note Two
:PROPERTIES:
:ID:      5970E7-4DAD-4E87-9256-B1E63E4C2885
:END:

This is another test note with an attachment.

[[attachment:attachment3.jpg]]

* Subheading with ID
:PROPERTIES:
:ID:      7ab7a4-c880-4012-865c-4168c1c43aba
:END:

Content under subheading with a link back to [[id:87f4a3-a24c-4a96-938f-f00ef1f67ef3][Note One]].
`;

export const FAKEDATA: FixtureDefinition = {
  dataDir: 'data',
  attachmentsDir: 'attachments',
  notes: [
    { path: 'data/note1.org', content: NOTE_ONE },
    { path: 'data/note2.org', content: NOTE_TWO },
  ],
  // Bucket names are literal; they are not derived from the leaf
  placeholders: [
    { bucket: '00', leaf: NOTE_ONE_ID, name: 'attachment1.png' },
    { bucket: '00', leaf: HEADING_ONE_ID, name: 'attachment2.pdf' },
    { bucket: '4d', leaf: NOTE_TWO_ID, name: 'attachment3.jpg' },
  ],
};
