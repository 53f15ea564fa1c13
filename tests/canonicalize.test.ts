import { describe, it, expect } from "vitest";
import { canonicalize, canonicalKey, normalizeDisplay, resolveKey } from "../lib/canonicalize";
import { makeLexicon, parseLexiconFile } from "../lib/lexicon";
import type { RawMention } from "../types";

const lexicon = makeLexicon({
  brands: ["KEF", "ELAC"],
  aliases: [{ alias: "Q150", canonical: "KEF Q150" }],
});

function mentions(...surfaces: string[]): RawMention[] {
  return surfaces.map((surfaceForm, i) => ({ recordRef: i, surfaceForm, spanOffset: 0, method: "brand_pattern" as const }));
}

describe("normalizeDisplay", () => {
  it("strips surrounding punctuation and tightens dashes", () => {
    expect(normalizeDisplay("  (KEF Q150).  ")).toBe("KEF Q150");
    expect(normalizeDisplay("Klipsch RP - 600M")).toBe("Klipsch RP-600M");
  });

  it("joins a lone letter with its digits", () => {
    expect(normalizeDisplay("KEF Q-150")).toBe("KEF Q150");
    expect(normalizeDisplay("KEF Q 150")).toBe("KEF Q150");
    expect(normalizeDisplay("B&W 607")).toBe("B&W 607");
    expect(normalizeDisplay("B & W 607")).toBe("B & W 607");
  });
});

describe("canonicalKey", () => {
  it("groups spelling variants", () => {
    expect(canonicalKey("KEF Q-150")).toBe("kefq150");
    expect(canonicalKey("kef  q 150")).toBe("kefq150");
    expect(canonicalKey("kef-q150")).toBe("kefq150");
    expect(canonicalKey("ELAC B6.2")).toBe("elacb62");
  });

  it("drops punctuation inside model tokens", () => {
    expect(canonicalKey("Klipsch RP-600M")).toBe("klipschrp600m");
    expect(canonicalKey("Klipsch RP600M")).toBe("klipschrp600m");
    expect(canonicalKey("KEF LS-50")).toBe(canonicalKey("KEF LS50"));
    expect(canonicalKey("SVS SB-1000")).toBe(canonicalKey("svs sb1000"));
  });

  it("collapses Bowers & Wilkins spellings", () => {
    expect(canonicalKey("Bowers 607")).toBe("bw607");
    expect(canonicalKey("Bowers & Wilkins 607")).toBe("bw607");
    expect(canonicalKey("B&W 607")).toBe("bw607");
    expect(canonicalKey("b and w 607")).toBe("bw607");
    expect(canonicalKey("B & W 607")).toBe("bw607");
  });
});

describe("resolveKey", () => {
  it("maps aliases and the curated name to one key", () => {
    expect(resolveKey("Q150", lexicon).key).toBe("kefq150");
    expect(resolveKey("KEF Q-150", lexicon).key).toBe("kefq150");
    expect(resolveKey("ELAC B6.2", lexicon)).toEqual({ key: "elacb62", alias: null });
  });
});

describe("canonicalize", () => {
  it("clusters variants and prefers the curated display name", () => {
    const result = canonicalize(mentions("kef-q150", "KEF Q150", "Q150", "ELAC B6.2"), lexicon);

    expect(Array.from(result.entities.keys())).toEqual(["elacb62", "kefq150"]);
    expect(result.entities.get("kefq150")).toEqual({
      key: "kefq150",
      displayName: "KEF Q150",
      aliased: true,
      variants: [
        { variant: "kef-q150", count: 1 },
        { variant: "KEF Q150", count: 1 },
        { variant: "Q150", count: 1 },
      ],
    });
    expect(result.entities.get("elacb62")?.aliased).toBe(false);
    expect(result.mentions.map(m => m.entityKey)).toEqual(["kefq150", "kefq150", "kefq150", "elacb62"]);
  });

  it("names an entity by its most frequent variant regardless of order", () => {
    const orders = [
      mentions("elac b6.2", "ELAC B6.2", "ELAC B6.2"),
      mentions("ELAC B6.2", "elac b6.2", "ELAC B6.2"),
      mentions("ELAC B6.2", "ELAC B6.2", "elac b6.2"),
    ];

    for (const order of orders) {
      const entity = canonicalize(order, lexicon).entities.get("elacb62");
      expect(entity?.displayName).toBe("ELAC B6.2");
      expect(entity?.variants).toEqual([
        { variant: "ELAC B6.2", count: 2 },
        { variant: "elac b6.2", count: 1 },
      ]);
    }
  });

  it("breaks variant ties by first appearance", () => {
    const entity = canonicalize(mentions("Elac B6.2", "ELAC B6.2"), lexicon).entities.get("elacb62");
    expect(entity?.displayName).toBe("Elac B6.2");
  });

  it("merges an aliased token with its hyphenated curated name", () => {
    const klipsch = makeLexicon({
      brands: ["Klipsch"],
      aliases: [{ alias: "RP600M", canonical: "Klipsch RP-600M" }],
    });
    const result = canonicalize(mentions("Klipsch RP600M", "RP600M", "klipsch rp-600m"), klipsch);

    expect(Array.from(result.entities.keys())).toEqual(["klipschrp600m"]);
    expect(result.entities.get("klipschrp600m")?.displayName).toBe("Klipsch RP-600M");
  });

  it("keys an inferred mention by brand and token", () => {
    const inferred: RawMention = {
      recordRef: 0,
      surfaceForm: "zx500",
      spanOffset: 0,
      method: "inferred_brand",
      inferredBrand: "B&W",
    };
    const result = canonicalize([inferred, ...mentions("Bowers ZX500")], lexicon);

    expect(result.entities.get("bwzx500")).toEqual({
      key: "bwzx500",
      displayName: "B&W ZX500",
      aliased: false,
      variants: [
        { variant: "B&W ZX500", count: 1 },
        { variant: "Bowers ZX500", count: 1 },
      ],
    });
  });

  it("counts surface forms that normalize to nothing", () => {
    const result = canonicalize(mentions("---", "KEF Q150"), lexicon);
    expect(result.unresolved).toBe(1);
    expect(result.mentions).toHaveLength(1);
  });
});

describe("parseLexiconFile", () => {
  it("applies defaults and rejects an empty brand list", () => {
    const parsed = parseLexiconFile({ brands: ["KEF"] });
    expect(parsed.brands).toEqual(["KEF"]);
    expect(parsed.phrases).toEqual([]);

    expect(() => parseLexiconFile({ brands: [] })).toThrow(/Invalid lexicon file/);
  });
});
