import { GetObjectCommand, NoSuchKey, type S3Client } from "@aws-sdk/client-s3";

export type OriginObject = {
  body: Buffer;
  contentType: string;
};

export type FetchObject = (key: string) => Promise<OriginObject | null>;

/** Stands in for the S3 origin CloudFront would forward a passthrough request to. */
export function createFetchObject(s3: S3Client, bucket: string): FetchObject {
  return async (key) => {
    try {
      const response = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      return {
        body: await streamToBuffer(response.Body),
        contentType: response.ContentType || "application/octet-stream",
      };
    } catch (error) {
      if (error instanceof NoSuchKey || isNotFound(error)) return null;
      throw error;
    }
  };
}

async function streamToBuffer(body: unknown): Promise<Buffer> {
  if (!body) return Buffer.alloc(0);
  if (Buffer.isBuffer(body)) return body;
  const chunks: Uint8Array[] = [];
  if (isAsyncIterable(body)) {
    for await (const chunk of body) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks);
  }
  return Buffer.alloc(0);
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array | string> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

function isNotFound(error: unknown) {
  if (!error || typeof error !== "object" || !("$metadata" in error)) return false;
  const meta = error.$metadata;
  return typeof meta === "object" && meta !== null && "httpStatusCode" in meta && meta.httpStatusCode === 404;
}
