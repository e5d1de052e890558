import type { Logger } from "@bucket-index/env";
import type { Entry } from "@bucket-index/storage";
import { encodePathSegment } from "./escape";
import { prettySize } from "./size";
import {
  renderDocumentBottom,
  renderDocumentTop,
  renderRow,
  renderTruncationNotice,
  type Crumb,
  type IconId,
  type RowInput,
} from "./template";

export type RenderOptions = {
  title: string;
  crumbs: Crumb[];
  /** Absolute path of the listed directory; row links resolve against it. */
  baseHref: string;
  /** Entries counted but not rendered, i.e. `entry=N` minus one. */
  skipCount: number;
  maxBytes: number;
  indexFile: string;
  trailingSlash: boolean;
  logger: Logger;
};

export type ListingPage = {
  document: string;
  totalEntriesSeen: number;
  renderedCount: number;
  truncated: boolean;
};

/**
 * Streams entries into listing rows in the order the store returned them.
 * Stops pulling as soon as the rows exceed `maxBytes` and links to the next
 * unseen entry instead.
 */
export async function renderListing(entries: AsyncIterable<Entry>, opts: RenderOptions): Promise<ListingPage> {
  const { logger } = opts;
  const indexName = opts.indexFile.toLowerCase();
  const rows: string[] = [];
  let rowBytes = 0;
  let totalEntriesSeen = 0;
  let renderedCount = 0;
  let truncated = false;

  for await (const entry of entries) {
    if (entry.name.toLowerCase() === indexName) continue;
    logger.debug(entry.absolutePath);

    totalEntriesSeen += 1;
    if (totalEntriesSeen <= opts.skipCount) continue;

    const row = describeEntry(entry, opts.trailingSlash, logger);
    if (!row) continue;

    const markup = renderRow(row);
    rows.push(markup);
    rowBytes += Buffer.byteLength(markup, "utf8");
    renderedCount += 1;

    if (rowBytes > opts.maxBytes) {
      rows.push(renderTruncationNotice(totalEntriesSeen + 1));
      truncated = true;
      break;
    }
  }

  return {
    document: renderDocumentTop(opts.title, opts.crumbs, opts.baseHref) + rows.join("") + renderDocumentBottom(),
    totalEntriesSeen,
    renderedCount,
    truncated,
  };
}

function describeEntry(entry: Entry, trailingSlash: boolean, logger: Logger): RowInput | null {
  const icon = iconFor(entry);
  const segment = encodePathSegment(entry.name);

  if (entry.isDirectory) {
    return {
      href: icon === "folder" && trailingSlash ? `${segment}/` : segment,
      name: entry.name,
      icon,
      sizeOrder: -1,
      sizeLabel: "&mdash;",
      modifiedIso: "",
      modifiedLabel: "-",
    };
  }

  try {
    const size = entry.sizeBytes;
    if (typeof size !== "number" || !Number.isFinite(size) || size < 0) {
      throw new Error(`invalid size ${String(size)}`);
    }
    const modified = entry.lastModified;
    if (!(modified instanceof Date) || Number.isNaN(modified.getTime())) {
      throw new Error("missing last-modified timestamp");
    }
    const seconds = new Date(Math.floor(modified.getTime() / 1000) * 1000);
    return {
      href: segment,
      name: entry.name,
      icon,
      sizeOrder: size,
      sizeLabel: prettySize(size),
      modifiedIso: seconds.toISOString().replace(".000Z", "Z"),
      modifiedLabel: seconds.toUTCString(),
    };
  } catch (error) {
    logger.error("Failed to read entry metadata", entry.absolutePath, error);
    return null;
  }
}

function iconFor(entry: Entry): IconId {
  if (entry.isDirectory) return entry.isSymlink ? "folder-shortcut" : "folder";
  return entry.isSymlink ? "file-shortcut" : "file";
}

/** `a/b` becomes `/a/b/`, the root `/`. */
export function directoryHref(directoryKey: string) {
  const segments = directoryKey.split("/").filter(Boolean);
  return segments.length ? `/${segments.map(encodePathSegment).join("/")}/` : "/";
}

/** Root crumb plus one per path segment; every crumb but the last links to its directory. */
export function buildCrumbs(directoryKey: string): Crumb[] {
  const segments = directoryKey.split("/").filter(Boolean);
  const crumbs: Crumb[] = [{ title: "/", href: segments.length ? "/" : null }];
  segments.forEach((segment, idx) => {
    const isLast = idx === segments.length - 1;
    crumbs.push({ title: segment, href: isLast ? null : directoryHref(segments.slice(0, idx + 1).join("/")) });
  });
  return crumbs;
}
