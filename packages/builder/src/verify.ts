/**
 * Fixture verification
 *
 * Reads a built tree back and checks its cross-references:
 * - every [[id:X]] resolves to a node ID defined in some note
 * - every attachment node N references ([[attachment:name]], or a local
 *   [[file:...]]) has attachments/<bucket>/<N.id>/<basename>
 *
 * Shard naming and unreferenced placeholders are reported as warnings only;
 * the fakedata buckets are literal and do not follow the prefix rule.
 */

import * as fs from 'fs';
import * as path from 'path';
import { attachmentBucket, isShardConsistent, parseOrgNodes, type OrgNode } from '@org-attach-fixtures/core';
import { FAKEDATA } from './fixture.js';
import { fixtureLog } from './log.js';

export type IssueKind =
  | 'dangling-id-link'
  | 'missing-attachment'
  | 'shard-mismatch'
  | 'orphan-attachment'
  | 'missing-directory';

export type IssueSeverity = 'error' | 'warning';

export interface VerificationIssue {
  kind: IssueKind;
  severity: IssueSeverity;
  message: string;
  /** Path relative to the fixture root */
  path: string;
}

export interface VerificationReport {
  root: string;
  nodeCount: number;
  attachmentCount: number;
  errors: VerificationIssue[];
  warnings: VerificationIssue[];
  ok: boolean;
}

interface LeafEntry {
  bucket: string;
  leaf: string;
  files: string[];
}

function listDir(dir: string): fs.Dirent[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

function readNotes(dataDir: string): Array<{ file: string; nodes: OrgNode[] }> {
  return listDir(dataDir)
    .filter(entry => entry.isFile() && entry.name.endsWith('.org'))
    .map(entry => ({
      file: entry.name,
      nodes: parseOrgNodes(fs.readFileSync(path.join(dataDir, entry.name), 'utf-8')),
    }));
}

function readLeaves(attachmentsDir: string): LeafEntry[] {
  const leaves: LeafEntry[] = [];
  for (const bucket of listDir(attachmentsDir)) {
    if (!bucket.isDirectory()) continue;
    for (const leaf of listDir(path.join(attachmentsDir, bucket.name))) {
      if (!leaf.isDirectory()) continue;
      const files = listDir(path.join(attachmentsDir, bucket.name, leaf.name))
        .filter(entry => entry.isFile())
        .map(entry => entry.name);
      leaves.push({ bucket: bucket.name, leaf: leaf.name, files });
    }
  }
  return leaves;
}

/**
 * Check cross-reference integrity of a fixture tree.
 */
export function verifyFixture(root: string): VerificationReport {
  const { dataDir, attachmentsDir } = FAKEDATA;
  const notes = readNotes(path.join(root, dataDir));
  const leaves = readLeaves(path.join(root, attachmentsDir));

  const errors: VerificationIssue[] = [];
  const warnings: VerificationIssue[] = [];

  if (!fs.existsSync(path.join(root, dataDir))) {
    warnings.push({
      kind: 'missing-directory',
      severity: 'warning',
      message: `No ${dataDir} directory under ${root}`,
      path: dataDir,
    });
  }

  const nodeIds = new Set<string>();
  for (const { nodes } of notes) {
    for (const node of nodes) nodeIds.add(node.id);
  }

  // bucket/leaf/name of every placeholder some note links to
  const referenced = new Set<string>();

  for (const { file, nodes } of notes) {
    const notePath = path.posix.join(dataDir, file);
    for (const node of nodes) {
      for (const link of node.links) {
        if (link.kind === 'id' && !nodeIds.has(link.id)) {
          errors.push({
            kind: 'dangling-id-link',
            severity: 'error',
            message: `"${node.title}" links to unknown ID ${link.id}`,
            path: notePath,
          });
        }
      }

      for (const attachment of node.attachments) {
        const name = path.posix.basename(attachment);
        const holder = leaves.find(entry => entry.leaf === node.id && entry.files.includes(name));
        if (holder) {
          referenced.add(path.posix.join(holder.bucket, holder.leaf, name));
        } else {
          errors.push({
            kind: 'missing-attachment',
            severity: 'error',
            message: `"${node.title}" references ${attachment} but no attachments/*/${node.id}/${name} exists`,
            path: notePath,
          });
        }
      }
    }
  }

  for (const { bucket, leaf, files } of leaves) {
    const leafPath = path.posix.join(attachmentsDir, bucket, leaf);
    if (!isShardConsistent(bucket, leaf)) {
      warnings.push({
        kind: 'shard-mismatch',
        severity: 'warning',
        message: `Bucket ${bucket} should be ${attachmentBucket(leaf)} for ${leaf}`,
        path: leafPath,
      });
    }
    for (const name of files) {
      if (!referenced.has(path.posix.join(bucket, leaf, name))) {
        warnings.push({
          kind: 'orphan-attachment',
          severity: 'warning',
          message: `No note links to ${name}`,
          path: path.posix.join(leafPath, name),
        });
      }
    }
  }

  const nodeCount = notes.reduce((sum, note) => sum + note.nodes.length, 0);
  const attachmentCount = leaves.reduce((sum, entry) => sum + entry.files.length, 0);

  for (const issue of errors) fixtureLog('verify', `${issue.kind}: ${issue.message}`, 'error');
  for (const issue of warnings) fixtureLog('verify', `${issue.kind}: ${issue.message}`, 'warn');
  fixtureLog('verify', `Checked ${nodeCount} nodes and ${attachmentCount} attachments: ${errors.length} errors, ${warnings.length} warnings`);

  return {
    root,
    nodeCount,
    attachmentCount,
    errors,
    warnings,
    ok: errors.length === 0,
  };
}
