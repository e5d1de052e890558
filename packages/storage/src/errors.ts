export class StoreEnumerationError extends Error {
  readonly bucket: string;
  readonly prefix: string;

  constructor(bucket: string, prefix: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to list s3://${bucket}/${prefix}: ${reason}`, { cause });
    this.name = "StoreEnumerationError";
    this.bucket = bucket;
    this.prefix = prefix;
  }
}
