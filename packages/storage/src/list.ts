import type { ListObjectsV2CommandInput, ListObjectsV2CommandOutput } from "@aws-sdk/client-s3";
import type { Logger } from "@bucket-index/env";
import { entryFromCommonPrefix, entryFromObject, type Entry } from "./entry";
import { StoreEnumerationError } from "./errors";

export type ListPage = (input: ListObjectsV2CommandInput) => Promise<ListObjectsV2CommandOutput>;

export type ListDirectoryOptions = {
  listPage: ListPage;
  bucket: string;
  prefix: string;
  logger: Logger;
};

/** `""`, `"."` and `"/"` all address the bucket root. */
export function normalizeListPrefix(input: string) {
  const trimmed = input.replace(/^\/+/, "");
  if (!trimmed || trimmed === ".") return "";
  return `${trimmed.replace(/\/+$/, "")}/`;
}

/**
 * Lazily walks one directory level. Each page yields its common prefixes
 * before its objects, and the next page is only requested once the consumer
 * has pulled everything from the current one.
 */
export async function* listDirectory(opts: ListDirectoryOptions): AsyncGenerator<Entry, void, undefined> {
  const { listPage, bucket, logger } = opts;
  const prefix = normalizeListPrefix(opts.prefix);
  let continuationToken: string | undefined;

  do {
    logger.debug(`Querying ${bucket} with prefix "${prefix}"`, { continuationToken });
    let result: ListObjectsV2CommandOutput;
    try {
      result = await listPage({
        Bucket: bucket,
        Prefix: prefix || undefined,
        Delimiter: "/",
        ContinuationToken: continuationToken,
      });
    } catch (error) {
      throw new StoreEnumerationError(bucket, prefix, error);
    }

    for (const commonPrefix of result.CommonPrefixes || []) {
      if (!commonPrefix.Prefix) continue;
      yield entryFromCommonPrefix(commonPrefix);
    }

    for (const object of result.Contents || []) {
      if (!object.Key) continue;
      // explicit "directory" object created for this prefix
      if (object.Key === prefix) continue;
      yield entryFromObject(object);
    }

    continuationToken = result.IsTruncated ? result.NextContinuationToken : undefined;
  } while (continuationToken);
}
