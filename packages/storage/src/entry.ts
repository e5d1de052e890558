import type { CommonPrefix, _Object } from "@aws-sdk/client-s3";

/**
 * One item under a listed prefix: either a common prefix (virtual folder)
 * or a concrete object. Size and timestamp are only ever set on objects.
 */
export type Entry =
  | {
      isDirectory: true;
      name: string;
      absolutePath: string;
      isSymlink: boolean;
    }
  | {
      isDirectory: false;
      name: string;
      absolutePath: string;
      sizeBytes?: number;
      lastModified?: Date;
      isSymlink: boolean;
    };

export function entryFromCommonPrefix(prefix: CommonPrefix): Entry {
  const absolutePath = (prefix.Prefix || "").replace(/^\/+/, "");
  return {
    isDirectory: true,
    name: basename(absolutePath),
    absolutePath,
    // the store has no symlinks
    isSymlink: false,
  };
}

export function entryFromObject(object: _Object): Entry {
  const absolutePath = object.Key || "";
  return {
    isDirectory: false,
    name: basename(absolutePath),
    absolutePath,
    sizeBytes: object.Size,
    lastModified: object.LastModified,
    isSymlink: false,
  };
}

export function basename(path: string) {
  const parts = path.split("/").filter(Boolean);
  return parts[parts.length - 1] || "";
}
