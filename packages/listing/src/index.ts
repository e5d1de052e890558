export { prettySize } from "./size";
export { buildCrumbs, directoryHref, renderListing, type ListingPage, type RenderOptions } from "./render";
export type { Crumb } from "./template";
export {
  bucketFromOrigin,
  cloudFrontRequestSchema,
  deriveDirectoryKey,
  handleListingRequest,
  hasTraversal,
  isResultResponse,
  parseEntryParam,
  parseOriginRequestEvent,
  safeDecodeUri,
  type CloudFrontHeaders,
  type CloudFrontRequest,
  type CloudFrontResultResponse,
  type ListingDeps,
} from "./request";
