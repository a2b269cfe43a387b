export { ContentSite } from "./site.js";

export type { ContentSiteOptions } from "./site.js";
export type {
  FailedOutcome,
  NotFoundOutcome,
  NotModifiedOutcome,
  RedirectOutcome,
  RenderedOutcome,
  SiteOutcome,
  SiteRequest
} from "./types.js";
