import { cleanText, parseSourceDate } from "@pharmaduty/shared";
import type { ValidityPeriod } from "@pharmaduty/shared";
import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { hasChildren, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import type { ParseGap, ParsedRosterPage, RawListing } from "../core/types";

export const LISTING_TABLE_SELECTOR = "table#datatable-buttons";

const TITLE_SELECTORS = ["h1.text-center", "h1"];
const PERIOD_PATTERN = /(\d{2}\/\d{2}\/\d{4})\s+au\s+(\d{2}\/\d{2}\/\d{4})/;
const CITY_SEPARATOR = " - ";
const MIN_CELLS = 3;

export function parseRosterPage(html: string): ParsedRosterPage {
  const $ = load(html);
  const gaps: ParseGap[] = [];

  const title = extractTitle($);
  const period = extractValidityPeriod(title);
  if (!period) {
    gaps.push({
      kind: "missing-period",
      detail: title ? `No valid date range in title "${title}"` : "Title heading not found"
    });
  }

  const table = $(LISTING_TABLE_SELECTOR).first();
  if (!table.length) {
    gaps.push({ kind: "missing-table", detail: `${LISTING_TABLE_SELECTOR} not found` });
    return { title, period, listings: [], gaps };
  }

  const listings: RawListing[] = [];
  table
    .find("tbody")
    .first()
    .find("tr")
    .each((index, row) => {
      const cells = $(row).find("td");
      if (cells.length < MIN_CELLS) {
        gaps.push({ kind: "short-row", detail: `Row ${index + 1} has ${cells.length} cell(s)` });
        return;
      }
      listings.push(parseListingCells(cells));
    });

  return { title, period, listings, gaps };
}

export function extractValidityPeriod(title: string): ValidityPeriod | null {
  const match = title.match(PERIOD_PATTERN);
  if (!match) {
    return null;
  }

  const startDate = parseSourceDate(match[1] ?? "");
  const endDate = parseSourceDate(match[2] ?? "");
  if (!startDate || !endDate) {
    return null;
  }

  return { startDate, endDate };
}

export function extractCityToken(address: string): string {
  const separatorAt = address.indexOf(CITY_SEPARATOR);
  if (separatorAt < 0) {
    return "";
  }
  return address.slice(0, separatorAt).trim();
}

function extractTitle($: CheerioAPI): string {
  for (const selector of TITLE_SELECTORS) {
    const text = cleanText($(selector).first().text());
    if (text) {
      return text;
    }
  }
  return "";
}

function parseListingCells(cells: Cheerio<Element>): RawListing {
  const name = cells.eq(0).find("b, strong").first().text().trim();
  const address = cells.eq(1).text().trim();
  const contactNumbers = collectText(cells.eq(2).toArray())
    .join("\n")
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);

  return {
    name,
    address,
    cityToken: extractCityToken(address),
    contactNumbers
  };
}

// Text nodes in document order; <br> and sibling elements end up on separate lines.
function collectText(nodes: AnyNode[]): string[] {
  const chunks: string[] = [];
  for (const node of nodes) {
    if (isText(node)) {
      chunks.push(node.data);
    } else if (hasChildren(node)) {
      chunks.push(...collectText(node.children));
    }
  }
  return chunks;
}
