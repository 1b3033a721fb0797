import * as cheerio from "cheerio";
import { config } from "../config";
import type { Logger } from "../logger";
import type { Country, PageFetcher, ResortListing } from "../types";
import { absoluteUrl, normalizeText } from "./utils";

export interface DirectoryDeps {
  fetchPage: PageFetcher;
  logger: Logger;
  baseUrl?: string;
}

export function directoryUrl(baseUrl: string, country: string): string {
  return `${baseUrl}/countries/${encodeURIComponent(country)}/resorts/`;
}

/**
 * Resort rows of one directory page. A row needs a `data-url` and a name
 * cell; anything else is skipped.
 */
export function parseResortRows($: cheerio.CheerioAPI): ResortListing[] {
  const resorts: ResortListing[] = [];

  $("tr.digest-row").each((_, el) => {
    const $row = $(el);
    const dataUrl = $row.attr("data-url");
    const nameCell = $row.find("div.name").first();
    if (!dataUrl || !nameCell.length) return;

    const name = normalizeText(nameCell.text());
    if (!name) return;

    resorts.push({
      name,
      url: nameCell.find("a").first().attr("href") ?? dataUrl,
      dataUrl,
    });
  });

  return resorts;
}

/** Hrefs of the region tabs some countries split their resort list across. */
export function parseTabLinks($: cheerio.CheerioAPI): string[] {
  return $("div#ctry_tabs a")
    .toArray()
    .map((el) => $(el).attr("href"))
    .filter((href): href is string => Boolean(href));
}

export async function fetchResortDirectory(
  country: string,
  deps: DirectoryDeps
): Promise<ResortListing[]> {
  const { baseUrl = config.baseUrl, logger } = deps;
  const url = directoryUrl(baseUrl, country);
  logger.info(`Fetching resort directory for ${country} from ${url}`);

  const $ = cheerio.load(await deps.fetchPage(url));
  const resorts = parseResortRows($);

  const tabs = parseTabLinks($);
  if (tabs.length > 0) {
    logger.debug(`${country} has ${tabs.length} tabs`);
  }
  for (const href of tabs) {
    const tabUrl = absoluteUrl(baseUrl, href);
    const tabResorts = parseResortRows(cheerio.load(await deps.fetchPage(tabUrl)));
    logger.debug(`Found ${tabResorts.length} resorts on ${tabUrl}`);
    resorts.push(...tabResorts);
  }

  logger.info(`Found ${resorts.length} resorts for ${country}`);
  return resorts;
}

/**
 * Countries listed under a region heading (`<a id="europe">`) on the country
 * index: the first `ul.countries-list` after the anchor in document order.
 */
export function parseCountries($: cheerio.CheerioAPI, region: string): Country[] {
  const anchor = $(`a[id="${region}"]`).first();
  if (!anchor.length) return [];

  const all = $("*");
  const anchorIndex = all.index(anchor);
  const list = $("ul.countries-list")
    .toArray()
    .find((el) => all.index(el) > anchorIndex);
  if (!list) return [];

  const countries: Country[] = [];
  $(list)
    .find("li")
    .each((_, li) => {
      const link = $(li).find("a").first();
      const href = link.attr("href");
      if (!link.length || !href) return;
      countries.push({ name: normalizeText(link.text()), url: href });
    });
  return countries;
}

export async function fetchCountries(
  deps: DirectoryDeps & { region?: string }
): Promise<Country[]> {
  const { baseUrl = config.baseUrl, region = "europe" } = deps;
  const $ = cheerio.load(await deps.fetchPage(`${baseUrl}/countries`));
  const countries = parseCountries($, region);
  if (countries.length === 0) {
    deps.logger.warn(`No countries found for region ${region}`);
  }
  return countries;
}
