import { describe, it, expect, vi } from "vitest";
import { TextEnricher } from "../text-enricher.js";
import { ArticleTranslator } from "../translate.js";
import { ArticleSummarizer } from "../summarize.js";
import type { CanonicalArticle } from "../../types.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ARTICLE: CanonicalArticle = {
  title: "Deep Learning for X",
  link: "https://arxiv.org/abs/2401.00001",
  authors: "Alice, Bob",
  rawDescription: "We detect **buildings**.",
};

function translatorReturning(text: string) {
  const translator = new ArticleTranslator({
    primary: { name: "deepl", translate: async () => text },
  });
  return { translator, spy: vi.spyOn(translator, "translate") };
}

function summarizerReturning(summary: string) {
  const summarizer = new ArticleSummarizer({
    model: { generate: async () => summary },
    prompt: "",
    marker: "*M*",
    primaryModel: "primary",
    lightModel: "light",
    sleepFn: async () => {},
  });
  return { summarizer, spy: vi.spyOn(summarizer, "summarize") };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("TextEnricher", () => {
  it("summarizes the link in summarize mode", async () => {
    const { summarizer, spy } = summarizerReturning("*M*\n要約\n\n#x");
    const { translator } = translatorReturning("訳");
    const enricher = new TextEnricher({ mode: "summarize", summarizer, translator });

    const enriched = await enricher.enrich(ARTICLE);

    expect(spy).toHaveBeenCalledWith(ARTICLE.link);
    expect(enriched).toEqual({
      ...ARTICLE,
      description: "*M*\n要約\n\n#x",
      enrichment: "summary",
    });
  });

  it("leaves the description empty when summarize mode gets no summary", async () => {
    const { summarizer } = summarizerReturning("no marker");
    const { translator, spy } = translatorReturning("訳");
    const enricher = new TextEnricher({ mode: "summarize", summarizer, translator });

    const enriched = await enricher.enrich(ARTICLE);

    expect(enriched.description).toBe("");
    expect(spy).not.toHaveBeenCalled();
  });

  it("translates and normalizes the abstract in translate mode", async () => {
    const { translator, spy } = translatorReturning("**建物**を検出する。\r\n");
    const enricher = new TextEnricher({ mode: "translate", translator });

    const enriched = await enricher.enrich(ARTICLE);

    expect(spy).toHaveBeenCalledWith(ARTICLE.rawDescription);
    expect(enriched.description).toBe("*建物*を検出する。");
    expect(enriched.enrichment).toBe("translation");
  });

  it("translates the abstract in auto mode when the summary is empty", async () => {
    const { summarizer } = summarizerReturning("no marker");
    const { translator } = translatorReturning("建物を検出する。");
    const enricher = new TextEnricher({ mode: "auto", summarizer, translator });

    const enriched = await enricher.enrich(ARTICLE);

    expect(enriched.description).toBe("建物を検出する。");
    expect(enriched.enrichment).toBe("translation");
  });

  it("keeps the summary in auto mode when there is one", async () => {
    const { summarizer } = summarizerReturning("*M* 要約");
    const { translator, spy } = translatorReturning("訳");
    const enricher = new TextEnricher({ mode: "auto", summarizer, translator });

    expect((await enricher.enrich(ARTICLE)).description).toBe("*M* 要約");
    expect(spy).not.toHaveBeenCalled();
  });

  it("does not call a translator for an empty abstract", async () => {
    const { translator, spy } = translatorReturning("訳");
    const enricher = new TextEnricher({ mode: "translate", translator });

    const enriched = await enricher.enrich({ ...ARTICLE, rawDescription: "" });

    expect(enriched.description).toBe("");
    expect(spy).not.toHaveBeenCalled();
  });

  it("degrades to an empty description instead of throwing", async () => {
    const { translator } = translatorReturning("訳");
    vi.spyOn(translator, "translate").mockRejectedValue(new Error("unexpected"));
    const enricher = new TextEnricher({ mode: "translate", translator });

    const enriched = await enricher.enrich(ARTICLE);

    expect(enriched.description).toBe("");
  });

  it("requires a summarizer outside translate mode", () => {
    const { translator } = translatorReturning("訳");
    expect(() => new TextEnricher({ mode: "auto", translator })).toThrow(
      'Enrich mode "auto" needs a summarizer',
    );
  });
});
