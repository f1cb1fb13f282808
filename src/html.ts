import * as cheerio from "cheerio";

const ERROR_KEYWORDS = ["404", "not found", "error", "503", "maintenance"] as const;

export interface ContentSignals {
  title: string | null;
  errorKeywords: string[];
  metaRefresh: boolean;
  wpContent: boolean;
  wpIncludes: boolean;
  metaGenerator: boolean;
}

function decodeContent(content: Buffer): string {
  return content.toString("utf8");
}

function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload);
}

function extractTitle($: cheerio.CheerioAPI): string | null {
  const title = $("title").first().text().trim();
  return title || null;
}

export function findErrorKeywords(text: string): string[] {
  const lower = text.toLowerCase();
  return ERROR_KEYWORDS.filter((word) => lower.includes(word));
}

function hasMetaRefresh($: cheerio.CheerioAPI): boolean {
  return $("meta")
    .toArray()
    .some((el) => ($(el).attr("http-equiv") ?? "").trim().toLowerCase() === "refresh");
}

function hasWordPressGenerator($: cheerio.CheerioAPI): boolean {
  const generator = $('meta[name="generator"]').first().attr("content") ?? "";
  return generator.toLowerCase().includes("wordpress");
}

/** Signals read from homepage bytes; keyword and marker checks run on the raw text. */
export function analyzeContent(content: Buffer): ContentSignals {
  const text = decodeContent(content);
  const lower = text.toLowerCase();
  const $ = loadHtml(text);
  return {
    title: extractTitle($),
    errorKeywords: findErrorKeywords(text),
    metaRefresh: hasMetaRefresh($),
    wpContent: lower.includes("wp-content"),
    wpIncludes: lower.includes("wp-includes"),
    metaGenerator: hasWordPressGenerator($),
  };
}
