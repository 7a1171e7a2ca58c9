import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  extractCaption,
  hasMedicalCode,
  selectQueryMode,
  SqlitePolicyIndex,
} from "../src/lattice/policy_index";

const CBD_POLICY =
  "Cannabidiol oral solution is medically necessary for seizures associated with Lennox-Gastaut syndrome.\n\n" +
  "Approval requires trial of two antiepileptic drugs.";

const PUMP_POLICY = "Insulin pumps are covered for type 1 diabetes with documented hypoglycemia.";

describe("selectQueryMode", () => {
  it("routes short code-like queries to keyword search", () => {
    expect(selectQueryMode("G40.812")).toBe("keyword");
    expect(selectQueryMode("J8499 oral")).toBe("keyword");
    expect(selectQueryMode("95816 EEG")).toBe("keyword");
    expect(selectQueryMode("0002-1433-80")).toBe("keyword");
  });

  it("routes short quoted phrases to keyword search", () => {
    expect(selectQueryMode('"cannabidiol oral solution"')).toBe("keyword");
  });

  it("routes long prose to semantic search", () => {
    expect(
      selectQueryMode(
        "patient with refractory seizures has tried two antiepileptic drugs without adequate response and needs coverage"
      )
    ).toBe("semantic");
  });

  it("uses hybrid search for everything in between", () => {
    expect(selectQueryMode("cannabidiol for lennox gastaut")).toBe("hybrid");
    expect(
      selectQueryMode("G40.812 refractory seizures after two antiepileptic drugs without adequate response to therapy")
    ).toBe("hybrid");
  });

  it("detects medical codes", () => {
    expect(hasMedicalCode("diagnosis G40.812")).toBe(true);
    expect(hasMedicalCode("insulin pump")).toBe(false);
  });
});

describe("extractCaption", () => {
  it("picks the sentence with the most query-term hits", () => {
    expect(extractCaption(CBD_POLICY, "antiepileptic drugs")).toBe(
      "Approval requires trial of two antiepileptic drugs."
    );
  });

  it("falls back to the first sentence", () => {
    expect(extractCaption(CBD_POLICY, "unrelated")).toBe(
      "Cannabidiol oral solution is medically necessary for seizures associated with Lennox-Gastaut syndrome."
    );
  });
});

describe("SqlitePolicyIndex", () => {
  let index: SqlitePolicyIndex;

  beforeEach(() => {
    index = new SqlitePolicyIndex({ dbPath: ":memory:" });
    index.ingest({ sourcePath: "policies/cbd.pdf", title: "Cannabidiol (Epidiolex)", content: CBD_POLICY });
    index.ingest({ sourcePath: "policies/pump.pdf", content: PUMP_POLICY });
  });

  afterEach(() => {
    index.close();
  });

  it("ranks keyword matches by bm25", async () => {
    const hits = await index.search("lennox", "keyword");

    expect(hits).toHaveLength(1);
    expect(hits[0]).toMatchObject({
      sourcePath: "policies/cbd.pdf",
      method: "fts5_bm25",
      caption:
        "Cannabidiol oral solution is medically necessary for seizures associated with Lennox-Gastaut syndrome.",
    });
    expect(hits[0].score).toBeGreaterThan(0);
    expect(hits[0].contentSnippet).toBe(CBD_POLICY);
  });

  it("matches the title in keyword search", async () => {
    const hits = await index.search("epidiolex", "keyword");
    expect(hits.map((h) => h.sourcePath)).toEqual(["policies/cbd.pdf"]);
  });

  it("ranks semantic matches by cosine similarity", async () => {
    const hits = await index.search("insulin pumps diabetes", "semantic");

    expect(hits[0].sourcePath).toBe("policies/pump.pdf");
    expect(hits[0].method).toBe("vec_cosine");
  });

  it("fuses both rankings in hybrid mode", async () => {
    const hits = await index.search("cannabidiol seizures", "hybrid");

    expect(hits[0].sourcePath).toBe("policies/cbd.pdf");
    expect(hits[0].method).toBe("hybrid_rrf");
    expect(hits[0].score).toBeCloseTo(1 / 61, 10);
  });

  it("returns nothing for a query without searchable terms", async () => {
    expect(await index.search("- !", "keyword")).toEqual([]);
  });

  it("replaces earlier chunks when a path is ingested again", async () => {
    expect(index.countChunks()).toBe(2);

    index.ingest({ sourcePath: "policies/cbd.pdf", content: "Superseded policy text about dronabinol." });

    expect(index.countChunks()).toBe(2);
    expect(await index.search("lennox", "keyword")).toEqual([]);
    expect((await index.search("dronabinol", "keyword")).map((h) => h.sourcePath)).toEqual(["policies/cbd.pdf"]);
  });

  it("removes a policy", async () => {
    expect(index.remove("policies/pump.pdf")).toBe(1);
    expect(index.countChunks()).toBe(1);
    expect(await index.search("insulin", "keyword")).toEqual([]);
  });

  it("returns one hit per source document", async () => {
    const small = new SqlitePolicyIndex({ chunkChars: 60 });
    try {
      const ingested = small.ingest({
        sourcePath: "policies/botox.pdf",
        content:
          "Botulinum toxin for chronic migraine.\n\nBotulinum toxin for cervical dystonia.\n\nBotulinum toxin for spasticity.",
      });
      expect(ingested).toEqual({ sourcePath: "policies/botox.pdf", chunks: 3 });

      const hits = await small.search("botulinum", "keyword");
      expect(hits).toHaveLength(1);
    } finally {
      small.close();
    }
  });

  it("honours the result limit", async () => {
    const hits = await index.search("covered necessary", "keyword", 1);
    expect(hits).toHaveLength(1);
  });

  it("delegates mode selection to the query classifier", () => {
    expect(index.selectMode("G40.812")).toBe("keyword");
  });
});
