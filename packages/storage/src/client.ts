import { ListObjectsV2Command, S3Client } from "@aws-sdk/client-s3";
import type { S3Config } from "@bucket-index/env";
import type { ListPage } from "./list";

const clients = new Map<string, S3Client>();

export function createS3Client(config: S3Config) {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: Boolean(config.endpoint),
    followRegionRedirects: true,
    credentials: config.credentials,
  });
}

/** One shared client per region, endpoint and access key; the bucket is not part of the client. */
export function getClient(config: S3Config) {
  const key = [config.region, config.endpoint ?? "", config.credentials?.accessKeyId ?? ""].join("|");
  let client = clients.get(key);
  if (!client) {
    client = createS3Client(config);
    clients.set(key, client);
  }
  return client;
}

export function createListPage(s3: S3Client): ListPage {
  return (input) => s3.send(new ListObjectsV2Command(input));
}
