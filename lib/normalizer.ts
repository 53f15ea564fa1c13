/**
 * Normalizer: RawDocument[] -> FlatRecord[]
 *
 * One record per post (title + body) and per comment, depth-first in the
 * original child order. Empty bodies and deleted/removed sentinels produce no
 * record; a deleted comment's replies are still walked.
 */

import tuning from '../config/tuning.json';
import type { FlatRecord, RawComment, RawDocument } from '@/types';

const DELETED_SENTINELS = new Set(
  tuning.normalizer.deleted_sentinels.map(s => s.toLowerCase())
);

export type FlattenResult = {
  records: FlatRecord[];
  deletedComments: number;
};

export function isDeletedBody(body: string): boolean {
  return DELETED_SENTINELS.has(body.trim().toLowerCase());
}

export function postText(doc: RawDocument): string {
  return `${doc.title.trim()}\n\n${doc.body.trim()}`.trim();
}

export function flattenDocuments(documents: RawDocument[]): FlattenResult {
  const records: FlatRecord[] = [];
  let deletedComments = 0;

  const walk = (doc: RawDocument, comment: RawComment) => {
    if (isDeletedBody(comment.body)) {
      deletedComments++;
    } else {
      const text = comment.body.trim();
      if (text) {
        records.push({
          recordId: `t1_${comment.id}`,
          sourceDocumentId: doc.id,
          text,
          voteScore: comment.score,
          isPost: false,
          depth: comment.depth
        });
      }
    }

    for (const child of comment.children) walk(doc, child);
  };

  for (const doc of documents) {
    // A removed post body still leaves the title
    const text = isDeletedBody(doc.body) ? doc.title.trim() : postText(doc);
    if (text) {
      records.push({
        recordId: `t3_${doc.id}`,
        sourceDocumentId: doc.id,
        text,
        voteScore: doc.score,
        isPost: true,
        depth: -1
      });
    }

    for (const comment of doc.comments) walk(doc, comment);
  }

  return { records, deletedComments };
}
