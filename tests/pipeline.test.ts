import { describe, it, expect } from "vitest";
import { runPipeline } from "../lib/pipeline";
import { rankTable } from "../lib/rank";
import type { EntityStats } from "../types";

const example = {
  id: "t1",
  body: "The KEF Q150 is great, much better than the kef-q150 I had",
  score: 10,
  comments: [{ id: "c1", parent_id: "t1", body: "Agreed, KEF Q150 > ELAC B6.2", score: 5, children: [] }],
};

const second = {
  id: "t2",
  title: "Bookshelf shootout",
  body: "ELAC B6.2 or elac b6.2? ELAC B6.2 for sure",
  score: 3,
  comments: [],
};

function summary(stats: EntityStats[]) {
  return stats.map(s => ({
    key: s.canonicalKey,
    name: s.canonicalModel,
    mentions: s.mentions,
    threads: s.uniqueThreads,
    votes: s.voteScore,
    scoreV2: s.scoreV2,
  }));
}

describe("runPipeline", () => {
  it("ranks the two-entity example", () => {
    const result = runPipeline([example]);
    const rows = rankTable(result.stats);

    expect(rows.map(r => [r.rank, r.canonicalModel, r.mentions, r.uniqueThreads, r.voteScore])).toEqual([
      [1, "KEF Q150", 3, 1, 15],
      [2, "ELAC B6.2", 1, 1, 5],
    ]);
    expect(result.report).toEqual({
      documents: 1,
      duplicateDocuments: 0,
      skippedDocuments: 0,
      skippedComments: 0,
      deletedComments: 0,
      records: 2,
      mentions: 4,
      entities: 2,
    });
  });

  it("is idempotent", () => {
    const a = runPipeline([example, second]);
    const b = runPipeline([example, second]);

    expect(b.fingerprint).toBe(a.fingerprint);
    expect(b.stats).toEqual(a.stats);
  });

  it("does not depend on document order", () => {
    const forward = runPipeline([example, second]);
    const reversed = runPipeline([second, example]);

    expect(summary(reversed.stats)).toEqual(summary(forward.stats));
    expect(summary(forward.stats).find(s => s.key === "elacb62")).toEqual({
      key: "elacb62",
      name: "ELAC B6.2",
      mentions: 4,
      threads: 2,
      votes: 8,
      scoreV2: expect.any(Number),
    });
  });

  it("merges hyphenated and unhyphenated spellings of a model", () => {
    const result = runPipeline([{
      id: "t3",
      body: "Klipsch RP-600M vs Klipsch RP600M, also KEF LS50 vs KEF LS-50 and SVS SB-1000 vs SVS SB1000",
      score: 1,
    }]);

    expect(result.stats.map(s => [s.canonicalKey, s.canonicalModel, s.mentions])).toEqual([
      ["kefls50", "KEF LS50", 2],
      ["klipschrp600m", "Klipsch RP-600M", 2],
      ["svssb1000", "SVS SB-1000", 2],
    ]);
  });

  it("ignores deleted comments but walks their replies", () => {
    const result = runPipeline([{
      id: "t9",
      body: "KEF Q150",
      score: 1,
      comments: [{
        id: "d",
        body: "[deleted]",
        score: 100,
        children: [{ id: "e", body: "KEF Q150 again", score: 2 }],
      }],
    }]);

    expect(result.stats.map(s => [s.canonicalModel, s.mentions, s.voteScore])).toEqual([["KEF Q150", 2, 3]]);
    expect(result.report.deletedComments).toBe(1);
  });

  it("skips malformed documents and later duplicates", () => {
    const result = runPipeline([example, { title: "no id" }, "junk", { ...example, score: 999 }]);

    expect(result.report.skippedDocuments).toBe(2);
    expect(result.report.duplicateDocuments).toBe(1);
    expect(result.stats.find(s => s.canonicalKey === "kefq150")?.voteScore).toBe(15);
  });

  it("returns an empty table for empty input", () => {
    const result = runPipeline([]);
    expect(result.stats).toEqual([]);
    expect(rankTable(result.stats, { n: 5 })).toEqual([]);
  });
});
