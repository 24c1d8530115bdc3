import * as cheerio from "cheerio";
import { ListingPage, ParseFailure, RecordFields, Task } from "../types";
import { cleanText, toAbsoluteUrl } from "../core/utils";
import { SiteAdapter, looksLikeHtml, parseFailure } from "./types";

const RATINGS = new Set(["One", "Two", "Three", "Four", "Five"]);

/**
 * Book catalogue laid out as `catalogue/page-N.html` listings of
 * `article.product_pod` cards, with a `li.next` pagination link.
 */
export const catalogueSite: SiteAdapter = {
  name: "catalogue",
  defaultBaseUrl: "https://books.toscrape.com/",
  defaultCategories: ["all"],

  listingSeeds(baseUrl, categories) {
    const url = new URL("catalogue/page-1.html", withTrailingSlash(baseUrl)).href;
    return [{ category: categories[0] ?? "all", url }];
  },

  parseListing(body, pageUrl): ListingPage | ParseFailure {
    if (!looksLikeHtml(body)) return parseFailure(pageUrl, "not an HTML document");
    const $ = cheerio.load(body);

    const detailUrls: string[] = [];
    $("article.product_pod h3 a").each((_, el) => {
      const url = toAbsoluteUrl($(el).attr("href"), pageUrl);
      if (url) detailUrls.push(url);
    });

    const nextPageUrl = toAbsoluteUrl($("li.next a").first().attr("href"), pageUrl);
    return { detailUrls, nextPageUrl };
  },

  parseDetail(body, task: Task): RecordFields | ParseFailure {
    const $ = cheerio.load(body);

    const title = cleanText($("div.product_main h1").first().text());
    if (!title) return parseFailure(task.url, "missing title");

    const ratingClass = $("p.star-rating").first().attr("class") ?? "";
    const rating =
      ratingClass
        .split(/\s+/)
        .find((c) => RATINGS.has(c)) ?? "";

    const productInformation: Record<string, string> = {};
    $("table.table.table-striped tr").each((_, row) => {
      const key = cleanText($(row).find("th").first().text());
      const value = cleanText($(row).find("td").first().text());
      if (key) productInformation[key] = value;
    });

    return {
      title,
      category: cleanText($("ul.breadcrumb li:nth-child(3) a").first().text()),
      price: cleanText($("div.product_main p.price_color").first().text()),
      rating,
      stock: cleanText($("div.product_main p.instock.availability").first().text()),
      image_url: toAbsoluteUrl($("div.item.active img").first().attr("src"), task.url) ?? "",
      description: cleanText($("#product_description ~ p").first().text()),
      product_information: productInformation,
    };
  },

  recordKey(record) {
    const info = record.fields["product_information"];
    if (typeof info === "object" && info !== null && "UPC" in info) {
      const upc = info.UPC;
      if (typeof upc === "string" && upc) return `upc:${upc}`;
    }
    return record.sourceUrl;
  },
};

function withTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : url + "/";
}
