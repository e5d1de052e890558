import type { ListObjectsV2CommandInput, ListObjectsV2CommandOutput } from "@aws-sdk/client-s3";
import { createLogger } from "@bucket-index/env";
import { describe, expect, it, vi } from "vitest";
import { basename, entryFromCommonPrefix, entryFromObject, type Entry } from "./entry";
import { StoreEnumerationError } from "./errors";
import { listDirectory, normalizeListPrefix } from "./list";

const logger = createLogger({ sink: { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } });

function fakeStore(pages: Omit<ListObjectsV2CommandOutput, "$metadata">[]) {
  return vi.fn(async (input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput> => {
    const index = input.ContinuationToken ? Number(input.ContinuationToken) : 0;
    const page = pages[index];
    if (!page) throw new Error(`no page ${index}`);
    return { $metadata: {}, ...page };
  });
}

async function collect(entries: AsyncIterable<Entry>) {
  const out: Entry[] = [];
  for await (const entry of entries) out.push(entry);
  return out;
}

describe("normalizeListPrefix", () => {
  it("maps the root sentinels to no prefix", () => {
    expect(normalizeListPrefix("")).toBe("");
    expect(normalizeListPrefix(".")).toBe("");
    expect(normalizeListPrefix("/")).toBe("");
  });

  it("strips the leading separator and ends with exactly one", () => {
    expect(normalizeListPrefix("/a/b")).toBe("a/b/");
    expect(normalizeListPrefix("a/b//")).toBe("a/b/");
  });
});

describe("entry formatting", () => {
  it("derives a directory name from its prefix", () => {
    expect(entryFromCommonPrefix({ Prefix: "/pub/rhel/8/" })).toEqual({
      isDirectory: true,
      name: "8",
      absolutePath: "pub/rhel/8/",
      isSymlink: false,
    });
  });

  it("keeps object size and timestamp", () => {
    const modified = new Date("2024-03-01T10:00:00Z");
    expect(entryFromObject({ Key: "pub/a.rpm", Size: 12, LastModified: modified })).toEqual({
      isDirectory: false,
      name: "a.rpm",
      absolutePath: "pub/a.rpm",
      sizeBytes: 12,
      lastModified: modified,
      isSymlink: false,
    });
  });

  it("takes the last non-empty segment", () => {
    expect(basename("a/b/c.txt")).toBe("c.txt");
    expect(basename("a/b/")).toBe("b");
    expect(basename("")).toBe("");
  });
});

describe("listDirectory", () => {
  it("yields directories before objects on each page and follows continuation tokens", async () => {
    const listPage = fakeStore([
      {
        CommonPrefixes: [{ Prefix: "repo/x/" }],
        Contents: [{ Key: "repo/", Size: 0 }, { Key: "repo/a.txt", Size: 1 }],
        IsTruncated: true,
        NextContinuationToken: "1",
      },
      {
        CommonPrefixes: [{ Prefix: "repo/y/" }],
        Contents: [{ Key: "repo/b.txt", Size: 2 }],
        IsTruncated: false,
      },
    ]);

    const entries = await collect(listDirectory({ listPage, bucket: "test-bucket", prefix: "/repo", logger }));

    expect(entries.map((entry) => entry.absolutePath)).toEqual(["repo/x/", "repo/a.txt", "repo/y/", "repo/b.txt"]);
    expect(listPage).toHaveBeenCalledTimes(2);
    expect(listPage.mock.calls[0]?.[0]).toEqual({
      Bucket: "test-bucket",
      Prefix: "repo/",
      Delimiter: "/",
      ContinuationToken: undefined,
    });
    expect(listPage.mock.calls[1]?.[0].ContinuationToken).toBe("1");
  });

  it("lists the bucket root without a prefix", async () => {
    const listPage = fakeStore([{ CommonPrefixes: [{ Prefix: "top/" }], IsTruncated: false }]);

    await collect(listDirectory({ listPage, bucket: "test-bucket", prefix: ".", logger }));

    expect(listPage.mock.calls[0]?.[0].Prefix).toBeUndefined();
  });

  it("does not fetch the next page until the consumer asks for it", async () => {
    const listPage = fakeStore([
      { CommonPrefixes: [{ Prefix: "d/x/" }], IsTruncated: true, NextContinuationToken: "1" },
      { CommonPrefixes: [{ Prefix: "d/y/" }], IsTruncated: false },
    ]);

    const iterator = listDirectory({ listPage, bucket: "test-bucket", prefix: "d", logger });
    const first = await iterator.next();
    await iterator.return(undefined);

    expect(first.value).toMatchObject({ name: "x" });
    expect(listPage).toHaveBeenCalledTimes(1);
  });

  it("raises a typed error at the point of failure", async () => {
    const listPage = fakeStore([
      { CommonPrefixes: [{ Prefix: "d/x/" }], IsTruncated: true, NextContinuationToken: "7" },
    ]);
    const seen: string[] = [];

    const run = async () => {
      for await (const entry of listDirectory({ listPage, bucket: "test-bucket", prefix: "d", logger })) {
        seen.push(entry.name);
      }
    };

    await expect(run()).rejects.toBeInstanceOf(StoreEnumerationError);
    await expect(run()).rejects.toThrow("Failed to list s3://test-bucket/d/: no page 7");
    expect(seen).toEqual(["x", "x"]);
  });
});
