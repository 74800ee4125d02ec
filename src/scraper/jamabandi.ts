import fs from "fs";
import path from "path";
import { FetchError, MissingFieldsError } from "../errors";
import { LandRecordData, LandRecordKey } from "../types";
import { log } from "../utils/logger";
import {
  loadPage,
  Page,
  readDropdown,
  readDropdownValues,
  readHiddenFields,
  readNakalDetails,
  readNakalRows,
} from "./forms";
import type { RecordFetcher } from "./index";
import { PortalSession, SessionOptions } from "./session";

export const RECORD_PAGE = "NakalRecord";
export const NAKAL_PAGE = "Nakal_khewat";

const CONTROL = "ctl00$ContentPlaceHolder1$";

// Dropdown controls, in the order the form cascades through them
type Dropdown = "ddldname" | "ddltname" | "ddlvname" | "ddlPeriod" | "ddlkhasra";

export interface JamabandiOptions extends SessionOptions {
  /** When set, the raw nakal page is written here. */
  htmlDir?: string;
}

/**
 * Server-side form state for one "Nakal by khasra" search. Every postback
 * hands back a fresh __VIEWSTATE / __EVENTVALIDATION that the next one must echo.
 */
class NakalForm {
  private viewState = "";
  private viewStateGenerator = "";
  private eventValidation = "";
  private eventArgument = "";
  private readonly selected: [Dropdown, string][] = [];

  constructor(private readonly session: PortalSession) {}

  async open(): Promise<void> {
    const $ = loadPage(await this.session.get(RECORD_PAGE));
    const hidden = readHiddenFields($);
    const missing: string[] = [];
    if (!hidden.viewState) missing.push("viewstate");
    if (!hidden.eventValidation) missing.push("event_validation");
    if (!hidden.viewStateGenerator) missing.push("viewstate_generator");
    if (missing.length) throw new MissingFieldsError(missing);

    this.viewState = hidden.viewState ?? "";
    this.eventValidation = hidden.eventValidation ?? "";
    this.viewStateGenerator = hidden.viewStateGenerator ?? "";
    this.eventArgument = hidden.eventArgument ?? "";
  }

  select(dropdown: Dropdown, value: string) {
    const existing = this.selected.find(([name]) => name === dropdown);
    if (existing) {
      existing[1] = value;
    } else {
      this.selected.push([dropdown, value]);
    }
  }

  async postBack(target: string, argument = this.eventArgument): Promise<Page> {
    const form: Record<string, string> = {
      __EVENTTARGET: `${CONTROL}${target}`,
      __EVENTARGUMENT: argument,
      __LASTFOCUS: "",
      __VIEWSTATE: this.viewState,
      __VIEWSTATEGENERATOR: this.viewStateGenerator,
      __SCROLLPOSITIONX: "0",
      __SCROLLPOSITIONY: "0",
      __VIEWSTATEENCRYPTED: "",
      __EVENTVALIDATION: this.eventValidation,
      [`${CONTROL}a`]: "RdobtnKhasra",
    };
    for (const [dropdown, value] of this.selected) {
      form[`${CONTROL}${dropdown}`] = value;
    }

    const $ = loadPage(await this.session.post(RECORD_PAGE, form));
    const hidden = readHiddenFields($);
    const missing: string[] = [];
    if (!hidden.viewState) missing.push("viewstate");
    if (!hidden.eventValidation) missing.push("event_validation");
    if (missing.length) throw new MissingFieldsError(missing);

    this.viewState = hidden.viewState ?? "";
    this.eventValidation = hidden.eventValidation ?? "";
    return $;
  }
}

function pickOption(
  options: Map<string, string>,
  wanted: string,
  label: string,
  plural: string
): string {
  if (options.size === 0) {
    throw new MissingFieldsError([plural]);
  }
  const value = options.get(wanted);
  if (value === undefined) {
    throw new FetchError("not_found", `${label}: ${wanted} not found`);
  }
  return value;
}

// Keeps each key part inside one path segment
const fileSafe = (part: string) => part.replace(/[\\/]/g, "-");

export function nakalFileName(key: LandRecordKey): string {
  const parts = [key.district_name, key.sub_district_name, key.village_name, key.khasra_no];
  return `${parts.map(fileSafe).join("_")}.html`;
}

/**
 * Fetches a land record ("nakal") from the Haryana Jamabandi portal by walking
 * its khasra search form: district, tehsil, village, latest year, khasra, then
 * the first matching khewat in the result grid.
 */
export class JamabandiFetcher implements RecordFetcher {
  constructor(private readonly options: JamabandiOptions) {}

  async fetch(key: LandRecordKey): Promise<LandRecordData> {
    const session = new PortalSession(this.options);
    const form = new NakalForm(session);

    log({ stage: "fetch_start", ...key });
    await form.open();

    form.select("ddldname", "-1");
    let $ = await form.postBack("RdobtnKhasra", "");
    const district_code = pickOption(
      readDropdown($, "Select District"), key.district_name, "District name", "districts"
    );
    log({ stage: "district_selected", district_code });

    form.select("ddldname", district_code);
    $ = await form.postBack("ddldname");
    const sub_district_code = pickOption(
      readDropdown($, "Select Tehsil/ Sub-Tehsil"), key.sub_district_name,
      "Sub-district/tehsil name", "sub-districts"
    );
    log({ stage: "sub_district_selected", sub_district_code });

    form.select("ddltname", sub_district_code);
    $ = await form.postBack("ddltname");
    const village_code = pickOption(
      readDropdown($, "Select Village"), key.village_name, "Village name", "villages"
    );
    log({ stage: "village_selected", village_code });

    form.select("ddlvname", village_code);
    $ = await form.postBack("ddlvname");
    const [jamabandi_year] = readDropdownValues($, "Jamabandi Year");
    if (!jamabandi_year) {
      throw new MissingFieldsError(["years"]);
    }
    log({ stage: "year_selected", jamabandi_year });

    form.select("ddlPeriod", jamabandi_year);
    $ = await form.postBack("ddlPeriod");
    const khasra_code = pickOption(
      readDropdown($, "Khasra"), key.khasra_no, "Khasra number", "khasras"
    );
    log({ stage: "khasra_selected", khasra_code });

    form.select("ddlkhasra", khasra_code);
    $ = await form.postBack("ddlkhasra");
    const [nakal] = readNakalRows($);
    if (!nakal) {
      throw new MissingFieldsError(["nakals"]);
    }
    log({ stage: "nakal_selected", target: nakal.target, khewat_no: nakal.khewat_no });

    await form.postBack("GridView1", nakal.target);
    const html = await session.get(NAKAL_PAGE, {
      referer: session.url(RECORD_PAGE),
      "sec-fetch-site": "same-origin",
    });
    const details = readNakalDetails(loadPage(html));

    if (this.options.htmlDir) {
      this.saveHtml(key, html, this.options.htmlDir);
    }

    log({ stage: "fetch_complete", khasra_no: key.khasra_no });
    return {
      district_name: key.district_name,
      sub_district_name: key.sub_district_name,
      village_name: key.village_name,
      khasra_no: key.khasra_no,
      district_code,
      sub_district_code,
      village_code,
      jamabandi_year,
      khewat_no: nakal.khewat_no,
      khatoni_no: nakal.khatoni_no,
      khasra_code,
      ...details,
    };
  }

  /** The copy is best-effort: a failure is logged and the fetched record still returned. */
  private saveHtml(key: LandRecordKey, html: string, dir: string) {
    const root = path.resolve(dir);
    const file = path.resolve(root, nakalFileName(key));
    if (path.dirname(file) !== root) {
      log({ stage: "nakal_html_failed", path: file, error: "path leaves the html directory" });
      return;
    }
    try {
      fs.mkdirSync(root, { recursive: true });
      fs.writeFileSync(file, html, "utf8");
      log({ stage: "nakal_html_saved", path: file });
    } catch (err) {
      log({
        stage: "nakal_html_failed",
        path: file,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
