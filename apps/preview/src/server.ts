import { createLogger, loadEnv, resolveListingConfig } from "@bucket-index/env";
import { createListPage, getClient } from "@bucket-index/storage";
import { createPreviewApp } from "./app";
import { createFetchObject } from "./origin";

const env = loadEnv();
const config = resolveListingConfig(env);
const bucket = config.s3.bucket;
if (!bucket) {
  throw new Error("LISTING_BUCKET is required for the preview server");
}
const logger = createLogger({ verbose: config.verbose, tag: "preview" });
const s3 = getClient(config.s3);

const app = createPreviewApp({
  config,
  listPage: createListPage(s3),
  fetchObject: createFetchObject(s3, bucket),
  logger,
});

app.listen(env.PREVIEW_PORT, () => {
  logger.info(`Preview server for s3://${bucket} listening on ${env.PREVIEW_PORT}`);
});
