import { createLogger, loadEnv, resolveListingConfig } from "@bucket-index/env";
import {
  handleListingRequest,
  parseOriginRequestEvent,
  type CloudFrontRequest,
  type CloudFrontResultResponse,
  type ListingDeps,
} from "@bucket-index/listing";
import { createListPage, getClient } from "@bucket-index/storage";

let deps: ListingDeps | null = null;

function getDeps(): ListingDeps {
  if (!deps) {
    const config = resolveListingConfig(loadEnv());
    const logger = createLogger({ verbose: config.verbose, tag: "index-gen" });
    deps = { config, listPage: createListPage(getClient(config.s3)), logger };
  }
  return deps;
}

export function createHandler(resolveDeps: () => ListingDeps) {
  return async (event: unknown): Promise<CloudFrontResultResponse | CloudFrontRequest> => {
    const current = resolveDeps();
    current.logger.debug("Received event", event);
    return handleListingRequest(parseOriginRequestEvent(event), current);
  };
}

/**
 * CloudFront origin-request trigger. Lambda@Edge has no environment, so the
 * bucket normally comes from the request's S3 origin.
 */
export const handler = createHandler(getDeps);
