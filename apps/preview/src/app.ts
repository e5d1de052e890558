import express, { type Request, type Response } from "express";
import {
  handleListingRequest,
  hasTraversal,
  isResultResponse,
  safeDecodeUri,
  type CloudFrontHeaders,
  type CloudFrontRequest,
  type ListingDeps,
} from "@bucket-index/listing";
import { StoreEnumerationError } from "@bucket-index/storage";
import type { FetchObject } from "./origin";

export type PreviewDeps = ListingDeps & {
  fetchObject: FetchObject;
};

/**
 * Local stand-in for the CDN: every GET goes through the origin-request
 * handler first and falls back to the bucket object on passthrough.
 */
export function createPreviewApp(deps: PreviewDeps) {
  const app = express();

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get("*", async (req: Request, res: Response) => {
    const request = toCloudFrontRequest(req);
    let result: Awaited<ReturnType<typeof handleListingRequest>>;
    try {
      result = await handleListingRequest(request, deps);
    } catch (error) {
      if (error instanceof StoreEnumerationError) {
        deps.logger.error("Listing failed", error.message);
        res.status(502).send("Upstream listing failed");
        return;
      }
      deps.logger.error("Preview request failed", error);
      res.status(500).send("Internal Server Error");
      return;
    }

    if (isResultResponse(result)) {
      for (const values of Object.values(result.headers)) {
        for (const header of values) {
          if (header.key) res.setHeader(header.key, header.value);
        }
      }
      res.status(Number(result.status)).send(result.body);
      return;
    }

    await sendOriginObject(result, deps, res);
  });

  return app;
}

async function sendOriginObject(request: CloudFrontRequest, deps: PreviewDeps, res: Response) {
  const decoded = safeDecodeUri(request.uri);
  if (decoded === null) {
    res.status(400).send("Bad Request");
    return;
  }
  const key = decoded.replace(/^\/+/, "");
  if (!key || hasTraversal(key)) {
    res.status(404).send("Not Found");
    return;
  }

  try {
    const object = await deps.fetchObject(key);
    if (!object) {
      res.status(404).send("Not Found");
      return;
    }
    res.setHeader("Content-Type", object.contentType);
    res.setHeader("Content-Length", String(object.body.length));
    res.status(200).send(object.body);
  } catch (error) {
    deps.logger.error("Failed to fetch origin object", key, error);
    res.status(502).send("Upstream fetch failed");
  }
}

export function toCloudFrontRequest(req: Request): CloudFrontRequest {
  const queryStart = req.originalUrl.indexOf("?");
  const headers: CloudFrontHeaders = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    headers[name.toLowerCase()] = values.map((item) => ({ key: name, value: item }));
  }
  return {
    uri: req.path,
    querystring: queryStart >= 0 ? req.originalUrl.slice(queryStart + 1) : "",
    method: req.method,
    clientIp: req.ip,
    headers,
  };
}
