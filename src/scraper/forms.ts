import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { MissingFieldsError } from "../errors";

export type Page = CheerioAPI;

export function loadPage(html: string): Page {
  return cheerio.load(html);
}

export interface HiddenFields {
  viewState?: string;
  viewStateGenerator?: string;
  eventValidation?: string;
  eventArgument?: string;
}

// ASP.NET WebForms state carried between postbacks
export function readHiddenFields($: Page): HiddenFields {
  const value = (name: string) => $(`input[name="${name}"]`).attr("value");
  return {
    viewState: value("__VIEWSTATE"),
    viewStateGenerator: value("__VIEWSTATEGENERATOR"),
    eventValidation: value("__EVENTVALIDATION"),
    eventArgument: value("__EVENTARGUMENT"),
  };
}

function dropdownOptions($: Page, label: string) {
  return $("div")
    .filter((_, div) => $(div).children("label").text().includes(label))
    .children("select")
    .children("option")
    .not("[selected]");
}

/**
 * Options of the dropdown whose label contains `label`, keyed by their visible
 * text. The pre-selected placeholder ("--Select--") is skipped.
 */
export function readDropdown($: Page, label: string): Map<string, string> {
  const options = new Map<string, string>();
  dropdownOptions($, label).each((_, option) => {
    const text = $(option).text().trim();
    const value = $(option).attr("value");
    if (text && value !== undefined) {
      options.set(text, value);
    }
  });
  return options;
}

export function readDropdownValues($: Page, label: string): string[] {
  return [...readDropdown($, label).values()];
}

export interface NakalRow {
  /** `__EVENTARGUMENT` that selects the row, e.g. "Select$0". */
  target: string;
  khewat_no: string;
  khatoni_no: string;
}

export function readNakalRows($: Page): NakalRow[] {
  const rows: NakalRow[] = [];
  $('table[id*="GridView"] tr').each((_, tr) => {
    const cells = $(tr).children("td");
    if (cells.length === 0) return;

    const href = cells.find("a").first().attr("href") ?? "";
    const target = href.match(/'(Select\$[^']*)'/)?.[1];
    if (!target) {
      throw new MissingFieldsError(["nakal_link"]);
    }
    rows.push({
      target,
      khewat_no: cells.eq(1).text().trim(),
      khatoni_no: cells.eq(2).text().trim(),
    });
  });
  return rows;
}

export interface NakalDetails {
  nakal_village: string;
  nakal_hadbast: string;
  nakal_tehsil: string;
  nakal_district: string;
  nakal_year: string;
}

const NAKAL_FIELDS = [
  "nakal_village",
  "nakal_hadbast",
  "nakal_tehsil",
  "nakal_district",
  "nakal_year",
] as const satisfies readonly (keyof NakalDetails)[];

export function readNakalDetails($: Page): NakalDetails {
  const text = (id: string) => $(`span#${id}`).first().text().trim();
  const details: NakalDetails = {
    nakal_village: text("lblvill"),
    nakal_hadbast: text("lblhad"),
    nakal_tehsil: text("lblteh"),
    nakal_district: text("lbldis"),
    nakal_year: text("lblyer"),
  };

  const missing = NAKAL_FIELDS.filter((field) => !details[field]);
  if (missing.length) {
    throw new MissingFieldsError(missing);
  }
  return details;
}
