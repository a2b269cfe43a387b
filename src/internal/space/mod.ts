export { loadSiteConfig, siteConfigSchema } from "./config.js";
export { CONTENT_TYPES, DEFAULT_CONTENT_TYPE, DIRECTORY_EXTENSION, contentTypeFor } from "./content-types.js";
export { extensionOf, normalizeDocPath, splitDocPath } from "./path.js";
export { SpaceResolver } from "./resolver.js";
export { ContentSpace, POST_CHAIN, PRE_CHAIN } from "./space.js";

export type { LoadSiteConfigOptions, RawSiteConfig, SiteConfig, SpaceConfig } from "./config.js";
export type { ContentSpaceInit, SpaceMode } from "./space.js";
