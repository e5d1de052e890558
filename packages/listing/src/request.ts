import { z } from "zod";
import type { ListingConfig, Logger } from "@bucket-index/env";
import { basename, listDirectory, type ListPage } from "@bucket-index/storage";
import { buildCrumbs, directoryHref, renderListing } from "./render";

const headerListSchema = z.array(z.object({ key: z.string().optional(), value: z.string() }));

const originSchema = z
  .object({
    s3: z.object({ domainName: z.string(), region: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const cloudFrontRequestSchema = z
  .object({
    uri: z.string(),
    querystring: z.string().optional(),
    method: z.string(),
    clientIp: z.string().optional(),
    headers: z.record(headerListSchema).optional(),
    origin: originSchema.optional(),
  })
  .passthrough();

const originRequestEventSchema = z.object({
  Records: z
    .array(
      z.object({
        cf: z.object({ request: cloudFrontRequestSchema }).passthrough(),
      }),
    )
    .min(1),
});

export type CloudFrontHeaders = Record<string, z.infer<typeof headerListSchema>>;
export type CloudFrontRequest = z.infer<typeof cloudFrontRequestSchema>;

export type CloudFrontResultResponse = {
  status: string;
  statusDescription: string;
  headers: CloudFrontHeaders;
  body: string;
};

export type ListingDeps = {
  config: ListingConfig;
  listPage: ListPage;
  logger: Logger;
};

export function parseOriginRequestEvent(event: unknown): CloudFrontRequest {
  const parsed = originRequestEventSchema.safeParse(event);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid origin-request event: ${message}`);
  }
  const [record] = parsed.data.Records;
  if (!record) throw new Error("Invalid origin-request event: no records");
  return record.cf.request;
}

export function isResultResponse(
  result: CloudFrontResultResponse | CloudFrontRequest,
): result is CloudFrontResultResponse {
  return !("uri" in result);
}

/**
 * Origin-request trigger body. Returns a synthesized listing for directory
 * URIs, or the request itself so the origin answers (real objects, 403/404,
 * traversal attempts).
 */
export async function handleListingRequest(
  request: CloudFrontRequest,
  deps: ListingDeps,
): Promise<CloudFrontResultResponse | CloudFrontRequest> {
  const { config, listPage, logger } = deps;

  const uri = safeDecodeUri(request.uri);
  if (uri === null || hasTraversal(uri)) {
    logger.debug("Passing through unsafe uri", request.uri);
    return request;
  }

  const bucket = config.s3.bucket ?? bucketFromOrigin(request);
  if (!bucket) {
    throw new Error(`No bucket to list for ${request.uri}: set LISTING_BUCKET or use an S3 origin`);
  }

  const directoryKey = deriveDirectoryKey(uri, config.indexFile);
  const firstEntry = parseEntryParam(request.querystring ?? "");

  const page = await renderListing(
    listDirectory({ listPage, bucket, prefix: directoryKey, logger }),
    {
      title: basename(directoryKey) || "/",
      crumbs: buildCrumbs(directoryKey),
      baseHref: directoryHref(directoryKey),
      skipCount: firstEntry - 1,
      maxBytes: config.maxBytes,
      indexFile: config.indexFile,
      trailingSlash: config.trailingSlash,
      logger,
    },
  );

  if (page.totalEntriesSeen === 0) {
    logger.debug("No entries under prefix, passing through", directoryKey);
    return request;
  }

  if (page.truncated) {
    logger.info(`Listing for "${directoryKey}" truncated after ${page.totalEntriesSeen} entries`);
  }

  return {
    status: "200",
    statusDescription: "OK",
    headers: {
      "cache-control": [{ key: "Cache-Control", value: "max-age=0" }],
      "content-type": [{ key: "Content-Type", value: "text/html" }],
    },
    body: page.document,
  };
}

/** `my-bucket.s3.us-east-1.amazonaws.com` and `my-bucket.s3.amazonaws.com` name `my-bucket`. */
export function bucketFromOrigin(request: CloudFrontRequest) {
  const domainName = request.origin?.s3?.domainName;
  if (!domainName) return null;
  const end = domainName.indexOf(".s3");
  return end > 0 ? domainName.slice(0, end) : null;
}

export function safeDecodeUri(uri: string) {
  try {
    return decodeURIComponent(uri);
  } catch {
    return null;
  }
}

export function hasTraversal(path: string) {
  return path.split("/").includes("..");
}

/** `/a/b/`, `/a/b/index.html` and `/a/b` all map to `a/b`. */
export function deriveDirectoryKey(uri: string, indexFile: string) {
  let key = uri;
  if (key.endsWith("/")) {
    key = key.replace(/\/+$/, "");
  } else {
    const slash = key.lastIndexOf("/");
    if (key.slice(slash + 1) === indexFile) {
      key = key.slice(0, Math.max(slash, 0));
    }
  }
  return key.replace(/^\/+/, "");
}

const entryParamSchema = z.coerce.number().int().min(1);

/** 1-based index of the first entry to show; anything unusable starts from the top. */
export function parseEntryParam(querystring: string) {
  const raw = new URLSearchParams(querystring).get("entry");
  if (raw === null) return 1;
  const parsed = entryParamSchema.safeParse(raw);
  return parsed.success ? parsed.data : 1;
}
