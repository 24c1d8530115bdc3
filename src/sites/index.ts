import { catalogueSite } from "./catalogue";
import { softwareDirectorySite } from "./software-directory";
import { SiteAdapter } from "./types";

const SITES: Record<string, SiteAdapter> = {
  [catalogueSite.name]: catalogueSite,
  [softwareDirectorySite.name]: softwareDirectorySite,
};

export function siteNames(): string[] {
  return Object.keys(SITES);
}

export function getSite(name: string): SiteAdapter | undefined {
  return SITES[name];
}

export { catalogueSite, softwareDirectorySite };
export type { SiteAdapter } from "./types";
