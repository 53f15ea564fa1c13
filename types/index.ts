// Core data models for ThreadTally

export interface RawComment {
  id: string;
  parentId: string | null;
  body: string;
  score: number;
  depth: number;
  children: RawComment[];
}

export interface RawDocument {
  id: string;
  title: string;
  body: string;
  score: number;
  comments: RawComment[];
}

/** One text-bearing post or comment, rebuilt every run */
export interface FlatRecord {
  recordId: string;
  sourceDocumentId: string;
  text: string;
  voteScore: number;
  isPost: boolean;
  depth: number;
}

export type MentionMethod = 'brand_pattern' | 'lexicon' | 'inferred_brand';

export interface RawMention {
  recordRef: number;    // index into the run's FlatRecord[]
  surfaceForm: string;  // exact text span, original casing
  spanOffset: number;   // char offset in record text
  method: MentionMethod;
  inferredBrand?: string;  // set only for 'inferred_brand'
}

export interface VariantCount {
  variant: string;
  count: number;
}

export interface CanonicalEntity {
  key: string;
  displayName: string;
  aliased: boolean;
  variants: VariantCount[];
}

export interface CanonicalMention {
  mention: RawMention;
  entityKey: string;
}

export interface EntityStats {
  canonicalKey: string;
  canonicalModel: string;
  mentions: number;
  uniqueThreads: number;
  voteScore: number;
  avgDocScore: number;
  avgVote: number;
  scoreV2: number;
  variants: VariantCount[];
}

export interface RankedRow extends EntityStats {
  rank: number;
}

export type ScoreVariant = 'v1' | 'v2';

export type SortColumn =
  | 'mentions'
  | 'score_v2'
  | 'vote_score'
  | 'unique_threads'
  | 'avg_doc_score'
  | 'avg_vote'
  | 'canonical_model';

export interface CandidateToken {
  token: string;
  count: number;
  examples: string[];
}

export interface RunReport {
  documents: number;
  duplicateDocuments: number;
  skippedDocuments: number;
  skippedComments: number;
  deletedComments: number;
  records: number;
  mentions: number;
  entities: number;
}

export interface PipelineResult {
  fingerprint: string;
  stats: EntityStats[];
  report: RunReport;
  candidates: CandidateToken[];
}

/** Published output of one completed run */
export interface PipelineRun {
  runId: string;
  completedAt: string;
  result: PipelineResult;
}
