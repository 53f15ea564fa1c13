/**
 * Ingestion boundary: untyped thread JSON -> RawDocument.
 *
 * Accepted import shapes:
 * - ThreadTally wrapper: { meta?, threads: [...] }
 * - bare array of threads, or a single thread object
 * - native thread dump: [postListing, commentListing] (t3 post + t1 comment tree)
 *
 * Defaulting rules: missing/non-numeric score -> 0, missing body -> '' (the
 * record is skipped later), body falls back to selftext. A thread without an id
 * is malformed and skipped; a comment without an id is dropped with its replies.
 */

import { z } from 'zod';
import { InvalidImportError, MalformedDocumentError } from './errors';
import type { RawComment, RawDocument } from '@/types';

const idSchema = z
  .union([z.string().trim().min(1), z.number().finite()])
  .transform(v => String(v));

const textSchema = z.string().catch('');

const scoreSchema = z.coerce.number().finite().catch(0);

const childListSchema = z.array(z.unknown()).catch([]);

const commentSchema = z.object({
  id: idSchema,
  parent_id: z.union([z.string(), z.number()]).transform(v => String(v)).nullish().catch(null),
  body: textSchema.optional(),
  score: scoreSchema.optional(),
  children: childListSchema.optional(),
  replies: z.unknown().optional()
});

const documentSchema = z.object({
  id: idSchema,
  title: textSchema.optional(),
  body: z.string().nullish().catch(null),
  selftext: z.string().nullish().catch(null),
  score: scoreSchema.optional(),
  comments: childListSchema.optional()
});

export type ParsedDocument = {
  document: RawDocument;
  skippedComments: number;
};

export type ImportBatch = {
  source: string;
  entries: unknown[];
};

export type MergeResult = {
  documents: RawDocument[];
  duplicates: number;
};

function stripKindPrefix(id: string): string {
  return id.replace(/^t\d_/, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Children may come nested (`children`), as a native replies listing
 * (`replies.data.children[].data`), or not at all.
 */
function childEntries(raw: z.infer<typeof commentSchema>): unknown[] {
  if (raw.children && raw.children.length > 0) return raw.children;

  const replies = raw.replies;
  if (!isRecord(replies) || !isRecord(replies.data) || !Array.isArray(replies.data.children)) {
    return [];
  }
  return replies.data.children
    .filter((c): c is Record<string, unknown> => isRecord(c) && c.kind === 't1')
    .map(c => c.data);
}

function parseComment(value: unknown, depth: number, counter: { skipped: number }): RawComment | null {
  const parsed = commentSchema.safeParse(value);
  if (!parsed.success) {
    counter.skipped++;
    return null;
  }

  const raw = parsed.data;
  const children: RawComment[] = [];
  for (const child of childEntries(raw)) {
    const c = parseComment(child, depth + 1, counter);
    if (c) children.push(c);
  }

  return {
    id: stripKindPrefix(raw.id),
    parentId: raw.parent_id ? stripKindPrefix(raw.parent_id) : null,
    body: raw.body ?? '',
    score: raw.score ?? 0,
    depth,
    children
  };
}

function setDepth(comment: RawComment, depth: number): void {
  comment.depth = depth;
  for (const child of comment.children) setDepth(child, depth + 1);
}

/**
 * Flat comment lists (linked by parent_id) are re-nested, keeping their
 * original order. Orphans and cycle members stay at the top level.
 */
export function nestComments(topLevel: RawComment[]): RawComment[] {
  const byId = new Map<string, RawComment>();
  for (const c of topLevel) {
    if (!byId.has(c.id)) byId.set(c.id, c);
  }

  const parentOf = (c: RawComment): RawComment | null => {
    if (!c.parentId || c.parentId === c.id) return null;
    return byId.get(c.parentId) ?? null;
  };

  const reachesSelf = (c: RawComment): boolean => {
    const seen = new Set<string>();
    let p = parentOf(c);
    while (p) {
      if (p.id === c.id) return true;
      if (seen.has(p.id)) return false;
      seen.add(p.id);
      p = parentOf(p);
    }
    return false;
  };

  const roots: RawComment[] = [];
  for (const c of topLevel) {
    const parent = parentOf(c);
    if (parent && byId.get(c.id) === c && !reachesSelf(c)) {
      parent.children.push(c);
    } else {
      roots.push(c);
    }
  }

  for (const r of roots) setDepth(r, 0);
  return roots;
}

/**
 * Validate one thread. Throws MalformedDocumentError when it cannot be used.
 */
export function parseDocument(value: unknown): ParsedDocument {
  if (!isRecord(value)) {
    throw new MalformedDocumentError('expected an object');
  }

  const parsed = documentSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new MalformedDocumentError(reason, { id: value.id });
  }

  const raw = parsed.data;
  const counter = { skipped: 0 };
  const comments: RawComment[] = [];
  for (const entry of raw.comments ?? []) {
    const c = parseComment(entry, 0, counter);
    if (c) comments.push(c);
  }

  return {
    document: {
      id: stripKindPrefix(raw.id),
      title: raw.title ?? '',
      body: raw.body ?? raw.selftext ?? '',
      score: raw.score ?? 0,
      comments: nestComments(comments)
    },
    skippedComments: counter.skipped
  };
}

/**
 * Convert a native [postListing, commentListing] dump into one thread object
 */
export function fromNativeListing(native: unknown[], source: string = 'upload.json'): Record<string, unknown> {
  const [postListing, commentListing] = native;

  const listingChildren = (listing: unknown): unknown[] =>
    isRecord(listing) && isRecord(listing.data) && Array.isArray(listing.data.children)
      ? listing.data.children
      : [];

  const postChild = listingChildren(postListing)[0];
  const post = isRecord(postChild) && isRecord(postChild.data) ? postChild.data : null;
  if (!post) {
    throw new InvalidImportError(`${source}: native listing has no post`, source);
  }

  const comments = listingChildren(commentListing)
    .filter((c): c is Record<string, unknown> => isRecord(c) && c.kind === 't1')
    .map(c => c.data);

  return {
    id: post.id,
    title: post.title,
    selftext: post.selftext,
    score: post.score,
    comments
  };
}

function isNativeListing(value: unknown[]): boolean {
  return value.length >= 2 && value.every(v => isRecord(v) && v.kind === 'Listing');
}

/**
 * Unwrap any accepted import shape into a list of thread entries (not yet validated)
 */
export function parseImportPayload(payload: unknown, source: string = 'upload.json'): ImportBatch {
  if (Array.isArray(payload)) {
    if (isNativeListing(payload)) {
      return { source, entries: [fromNativeListing(payload, source)] };
    }
    return { source, entries: payload };
  }

  if (isRecord(payload)) {
    if ('threads' in payload) {
      if (!Array.isArray(payload.threads)) {
        throw new InvalidImportError(`${source}: 'threads' must be a list`, source);
      }
      return { source, entries: payload.threads };
    }
    return { source, entries: [payload] };
  }

  throw new InvalidImportError(
    `${source}: unsupported JSON shape. Expected an object, a list of threads, or a native listing pair.`,
    source
  );
}

/**
 * Dedupe by id across batches. First seen wins so vote scores stay stable
 * when a thread is imported again.
 */
export function mergeDocuments(batches: RawDocument[][]): MergeResult {
  const seen = new Set<string>();
  const documents: RawDocument[] = [];
  let duplicates = 0;

  for (const batch of batches) {
    for (const doc of batch) {
      if (seen.has(doc.id)) {
        duplicates++;
        continue;
      }
      seen.add(doc.id);
      documents.push(doc);
    }
  }

  return { documents, duplicates };
}

export function countComments(comments: RawComment[]): number {
  return comments.reduce((acc, c) => acc + 1 + countComments(c.children), 0);
}
