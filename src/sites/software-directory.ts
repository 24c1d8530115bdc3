import * as cheerio from "cheerio";
import { ListingPage, ParseFailure, RecordFields, Task } from "../types";
import { cleanText, toAbsoluteUrl } from "../core/utils";
import { SiteAdapter, looksLikeHtml, parseFailure } from "./types";

type CheerioDoc = cheerio.CheerioAPI;

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/&/g, " ")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Value printed next to a label, in either `<dt>label</dt><dd>value</dd>`
 * or `<span>label</span><span>value</span>` form.
 */
function labelledValue($: CheerioDoc, label: string): string {
  const wanted = label.toLowerCase();
  let value = "";
  $("dt, th, span, div, p, h3, h4").each((_, el) => {
    const $el = $(el);
    if ($el.children().length > 0) return;
    if (cleanText($el.text()).toLowerCase() !== wanted) return;
    value = cleanText($el.next().text());
    if (value) return false;
  });
  return value;
}

/**
 * Software pricing directory: one listing per category at
 * `/categories/<slug>`, product links under `/marketplace/`, paginated
 * with `rel="next"`.
 */
export const softwareDirectorySite: SiteAdapter = {
  name: "software",
  defaultBaseUrl: "https://www.vendr.com",
  defaultCategories: ["DevOps", "IT Infrastructure", "Data Analytics & Management"],

  listingSeeds(baseUrl, categories) {
    return categories.map((category) => ({
      category,
      url: new URL(`/categories/${slugify(category)}`, baseUrl).href,
    }));
  },

  parseListing(body, pageUrl): ListingPage | ParseFailure {
    if (!looksLikeHtml(body)) return parseFailure(pageUrl, "not an HTML document");
    const $ = cheerio.load(body);

    const detailUrls: string[] = [];
    $('a[href*="/marketplace/"]').each((_, el) => {
      const url = toAbsoluteUrl($(el).attr("href"), pageUrl);
      if (url && !detailUrls.includes(url)) detailUrls.push(url);
    });

    const nextHref =
      $('a[rel="next"]').first().attr("href") ?? $('link[rel="next"]').first().attr("href");
    return { detailUrls, nextPageUrl: toAbsoluteUrl(nextHref, pageUrl) };
  },

  parseDetail(body, task: Task): RecordFields | ParseFailure {
    const $ = cheerio.load(body);

    const name = cleanText($("h1").first().text());
    if (!name) return parseFailure(task.url, "missing product name");

    const description =
      $('meta[name="description"]').attr("content")?.trim() ||
      cleanText($("main p").first().text());

    return {
      name,
      category: task.category ?? "",
      description,
      price_range: labelledValue($, "Price range"),
      median_price: labelledValue($, "Median price"),
    };
  },

  recordKey(record) {
    const name = record.fields["name"];
    const category = record.fields["category"];
    if (typeof name === "string" && name) {
      return `${slugify(typeof category === "string" ? category : "")}/${slugify(name)}`;
    }
    return record.sourceUrl;
  },
};
