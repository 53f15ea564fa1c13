import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { NextRequest } from "next/server";
import { GET as health } from "../app/api/health/route";
import { POST as importThreads } from "../app/api/import/route";
import { POST as startRun } from "../app/api/pipeline/route";
import { GET as topModels } from "../app/api/top-models/route";
import { errorResponse } from "../lib/api-response";
import { PipelineBusyError } from "../lib/errors";
import { resetState } from "../lib/state";

const example = {
  id: "t1",
  body: "The KEF Q150 is great, much better than the kef-q150 I had",
  score: 10,
  comments: [{ id: "c1", parent_id: "t1", body: "Agreed, KEF Q150 > ELAC B6.2", score: 5, children: [] }],
};

function post(url: string, body: string): NextRequest {
  return new NextRequest(`http://localhost${url}`, {
    method: "POST",
    body,
    headers: { "content-type": "application/json" },
  });
}

function get(url: string, headers: Record<string, string> = {}): NextRequest {
  return new NextRequest(`http://localhost${url}`, { headers });
}

describe("API routes", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "threadtally-api-"));
    resetState({ rawDir: path.join(dir, "raw"), processedDir: path.join(dir, "processed") });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns 404 before the first run", async () => {
    const res = await topModels(get("/api/top-models"));
    expect(res.status).toBe(404);
    expect((await res.json()).error.code).toBe("NO_RESULTS");
  });

  it("imports, runs and serves the ranking", async () => {
    const imported = await importThreads(post("/api/import?source=sample.json", JSON.stringify({ threads: [example] })));
    expect(imported.status).toBe(201);
    expect((await imported.json()).data).toEqual({
      source: "sample.json",
      threads: 1,
      comments: 1,
      skipped: 0,
      duplicates: 0,
      stored_threads: { before: 0, after: 1 },
    });
    expect(fs.readdirSync(path.join(dir, "raw"))).toHaveLength(1);

    const ran = await startRun();
    expect(ran.status).toBe(200);
    expect((await ran.json()).data.report.entities).toBe(2);
    expect(fs.existsSync(path.join(dir, "processed", "ranked_models_v2.csv"))).toBe(true);

    const res = await topModels(get("/api/top-models?n=1"));
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.data.n).toBe(1);
    expect(body.data.variant).toBe("v2");
    expect(body.data.rows).toEqual([{
      rank: 1,
      canonical_model: "KEF Q150",
      mentions: 3,
      unique_threads: 1,
      vote_score: 15,
      score_v2: 100,
      avg_doc_score: 5,
      avg_vote: 3.9887,
    }]);

    const etag = res.headers.get("ETag");
    expect(etag).toMatch(/^"[0-9a-f]{16}"$/);

    const cached = await topModels(get("/api/top-models?n=1", { "If-None-Match": etag ?? "" }));
    expect(cached.status).toBe(304);

    const other = await topModels(get("/api/top-models?n=2", { "If-None-Match": etag ?? "" }));
    expect(other.status).toBe(200);
  });

  it("changes the ETag when a new run is published", async () => {
    await importThreads(post("/api/import", JSON.stringify(example)));
    await startRun();
    const etag = (await topModels(get("/api/top-models"))).headers.get("ETag") ?? "";

    await startRun();
    const res = await topModels(get("/api/top-models", { "If-None-Match": etag }));

    expect(res.status).toBe(200);
    expect(res.headers.get("ETag")).not.toBe(etag);
    expect((await res.json()).data.run_id).toMatch(/_2$/);
  });

  it("ranks by mentions when v2=0 and rejects unknown sort columns", async () => {
    await importThreads(post("/api/import", JSON.stringify([example])));
    await startRun();

    const v1 = await (await topModels(get("/api/top-models?v2=0"))).json();
    expect(v1.data.variant).toBe("v1");
    expect(v1.data.sort).toBe("mentions");

    const bad = await topModels(get("/api/top-models?sort=price"));
    expect(bad.status).toBe(400);
    expect((await bad.json()).error.code).toBe("INVALID_SORT");
  });

  it("rejects bodies that are not importable", async () => {
    const notJson = await importThreads(post("/api/import", "{"));
    expect(notJson.status).toBe(400);
    expect((await notJson.json()).error.code).toBe("INVALID_IMPORT");

    const wrongShape = await importThreads(post("/api/import", "42"));
    expect(wrongShape.status).toBe(400);
  });

  it("reports store counts and the last run", async () => {
    const before = await (await health()).json();
    expect(before.data.store).toEqual({ batches: 0, threads: 0 });
    expect(before.data.last_run).toBeNull();

    await importThreads(post("/api/import", JSON.stringify(example)));
    await startRun();

    const after = await (await health()).json();
    expect(after.data.store).toEqual({ batches: 1, threads: 1 });
    expect(after.data.last_run.entities).toBe(2);
  });

  it("maps pipeline errors to their status", async () => {
    const res = errorResponse(new PipelineBusyError("run_x"), "test");
    expect(res.status).toBe(409);
    expect((await res.json()).error).toEqual({
      message: "Pipeline run run_x is still in progress",
      code: "PIPELINE_BUSY",
    });
  });
});
