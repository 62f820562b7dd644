import { describe, it, expect } from "vitest";
import { extractAnchors } from "../src/digest/link-extractor.js";
import {
  findBestAnchor,
  matchLink,
  normalizeTitle,
  scoreAnchor,
  sequenceRatio,
  wordOverlap,
} from "../src/digest/link-matcher.js";
import { DIGEST_HTML } from "./helpers.js";

describe("normalizeTitle", () => {
  it("drops the ordinal prefix and lower-cases", () => {
    expect(normalizeTitle("2. China Trade Talks")).toBe("china trade talks");
  });

  it("drops leading emoji and bullets", () => {
    expect(normalizeTitle("🔥 • Oil   Slips")).toBe("oil slips");
  });
});

describe("similarity primitives", () => {
  it("computes the sequence ratio from the longest common subsequence", () => {
    expect(sequenceRatio("abcd", "abxd")).toBe(0.75);
    expect(sequenceRatio("", "")).toBe(1);
    expect(sequenceRatio("abc", "")).toBe(0);
  });

  it("measures overlap against the title's words", () => {
    expect(wordOverlap("china trade talks", "china talks resume")).toBeCloseTo(2 / 3);
    expect(wordOverlap("", "anything")).toBe(0);
  });

  it("ignores common English and Portuguese words in the overlap", () => {
    expect(wordOverlap("gold rises on the news", "read more on the site")).toBe(0);
    expect(wordOverlap("alta do dólar em são paulo", "queda do petróleo em londres")).toBe(0);
    expect(wordOverlap("the of and", "the of and")).toBe(0);
  });

  it("weights similarity 0.6 and overlap 0.4", () => {
    const score = scoreAnchor("Dollar Gains", "zzz qqq");

    expect(score.overlap).toBe(0);
    expect(score.similarity).toBeCloseTo(2 / 19);
    expect(score.score).toBeCloseTo(0.6 * (2 / 19));
  });
});

describe("matchLink", () => {
  const anchors = [
    { text: "Fed raises rates", url: "https://news.example.com/url1" },
    { text: "Totally unrelated topic", url: "https://news.example.com/url2" },
  ];

  it("returns the url of an identical headline", () => {
    expect(
      matchLink("Dollar Gains on Fed Comments", [
        { text: "Totally unrelated topic", url: "https://news.example.com/url2" },
        { text: "Dollar Gains on Fed Comments", url: "https://news.example.com/url1" },
      ])
    ).toBe("https://news.example.com/url1");
  });

  it("prefers the closer anchor but refuses it below the floor", () => {
    const best = findBestAnchor("Dollar Gains on Fed Comments", anchors, 0);

    expect(best?.url).toBe("https://news.example.com/url1");
    // similarity 18/44, overlap 1/4 ("on" is not counted)
    expect(best?.score).toBeCloseTo(0.6 * (18 / 44) + 0.4 * 0.25);
    expect(matchLink("Dollar Gains on Fed Comments", anchors)).toBeNull();
  });

  it("returns null when every anchor scores below the floor", () => {
    expect(matchLink("Dollar Gains", [{ text: "zzz qqq", url: "https://news.example.com/z" }])).toBeNull();
  });

  it("refuses an anchor that shares only common words with the title", () => {
    const anchors = [{ text: "Read more on the site", url: "https://news.example.com/more" }];

    expect(scoreAnchor("Gold rises on the news", anchors[0].text).overlap).toBe(0);
    expect(matchLink("Gold rises on the news", anchors)).toBeNull();
  });

  it("keeps the first anchor on a tie", () => {
    const tied = [
      { text: "Oil Slips", url: "https://news.example.com/first" },
      { text: "Oil Slips", url: "https://news.example.com/second" },
    ];

    expect(matchLink("Oil Slips", tied)).toBe("https://news.example.com/first");
  });

  it("returns null for an empty title or no anchors", () => {
    expect(matchLink("", anchors)).toBeNull();
    expect(matchLink("Oil Slips", [])).toBeNull();
  });
});

describe("extractAnchors", () => {
  it("keeps content links in document order and drops the footer", () => {
    expect(extractAnchors(DIGEST_HTML)).toEqual([
      { text: "Dollar Gains on Fed Comments", url: "https://news.example.com/markets/dollar-gains-fed" },
      { text: "China Trade Talks Resume in Geneva", url: "https://news.example.com/world/china-trade-talks" },
    ]);
  });

  it("drops mailto, social, short, url-text and duplicate links", () => {
    const html = `
      <a href="mailto:desk@example.com">Write to the desk</a>
      <a href="https://twitter.com/example">Our feed on the web</a>
      <a href="https://news.example.com/a"><img src="x.png"></a>
      <a href="https://news.example.com/b">https://news.example.com/b</a>
      <a href="https://news.example.com/c">Gold Rallies &amp; Silver Follows</a>
      <a href='https://news.example.com/c'>Gold again</a>
      <a href="https://news.example.com/d">Contact us</a>`;

    expect(extractAnchors(html)).toEqual([
      { text: "Gold Rallies & Silver Follows", url: "https://news.example.com/c" },
    ]);
  });

  it("decodes entities in the href", () => {
    const html =
      '<a href="https://click.news.example.com/t?u=1&amp;id=42">Dollar Gains on Fed Comments</a>';

    expect(extractAnchors(html)).toEqual([
      { text: "Dollar Gains on Fed Comments", url: "https://click.news.example.com/t?u=1&id=42" },
    ]);
  });
});
