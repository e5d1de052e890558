import { createLogger } from "@bucket-index/env";
import type { Entry } from "@bucket-index/storage";
import { describe, expect, it, vi } from "vitest";
import { buildCrumbs, directoryHref, renderListing, type RenderOptions } from "./render";

function makeOptions(overrides: Partial<RenderOptions> = {}) {
  const sink = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const options: RenderOptions = {
    title: "repo",
    crumbs: buildCrumbs("repo"),
    baseHref: "/repo/",
    skipCount: 0,
    maxBytes: 1_000_000,
    indexFile: "index.html",
    trailingSlash: true,
    logger: createLogger({ sink }),
    ...overrides,
  };
  return { options, sink };
}

async function* fromArray(entries: Entry[]) {
  for (const entry of entries) yield entry;
}

const dir = (name: string): Entry => ({
  isDirectory: true,
  name,
  absolutePath: `repo/${name}/`,
  isSymlink: false,
});

const file = (name: string, sizeBytes: number | undefined, lastModified?: Date): Entry => ({
  isDirectory: false,
  name,
  absolutePath: `repo/${name}`,
  sizeBytes,
  lastModified,
  isSymlink: false,
});

const MODIFIED = new Date("2024-05-06T07:08:09.456Z");

function renderedNames(document: string) {
  return [...document.matchAll(/<span class="name">([^<]*)<\/span>/g)].map((match) => match[1]);
}

describe("renderListing", () => {
  it("leaves out index.html in any case without counting it", async () => {
    const { options } = makeOptions();
    const page = await renderListing(
      fromArray([file("INDEX.HTML", 10, MODIFIED), dir("a"), file("index.html", 5, MODIFIED), file("b.txt", 1, MODIFIED)]),
      options,
    );

    expect(renderedNames(page.document)).toEqual(["a", "b.txt"]);
    expect(page.totalEntriesSeen).toBe(2);
  });

  it("keeps store order", async () => {
    const { options } = makeOptions();
    const page = await renderListing(fromArray([file("z.txt", 1, MODIFIED), dir("b"), dir("a")]), options);

    expect(renderedNames(page.document)).toEqual(["z.txt", "b", "a"]);
  });

  it("renders directory and file rows", async () => {
    const { options } = makeOptions();
    const page = await renderListing(fromArray([dir("el8"), file("a b.rpm", 2048, MODIFIED)]), options);

    expect(page.document).toContain('<a href="el8/">');
    expect(page.document).toContain('<use xlink:href="#folder"></use>');
    expect(page.document).toContain('<td data-order="-1">&mdash;</td>');
    expect(page.document).toContain('<a href="a%20b.rpm">');
    expect(page.document).toContain('<use xlink:href="#file"></use>');
    expect(page.document).toContain('<td data-order="2048">2 KB</td>');
    expect(page.document).toContain(
      '<time datetime="2024-05-06T07:08:09Z">Mon, 06 May 2024 07:08:09 GMT</time>',
    );
  });

  it("omits the trailing slash on directory links when disabled", async () => {
    const { options } = makeOptions({ trailingSlash: false });
    const page = await renderListing(fromArray([dir("el8")]), options);

    expect(page.document).toContain('<a href="el8">');
  });

  it("uses shortcut icons for symlinks", async () => {
    const { options } = makeOptions();
    const page = await renderListing(
      fromArray([{ ...dir("linked"), isSymlink: true }, { ...file("l.txt", 1, MODIFIED), isSymlink: true }]),
      options,
    );

    expect(page.document).toContain('<use xlink:href="#folder-shortcut"></use>');
    expect(page.document).toContain('<use xlink:href="#file-shortcut"></use>');
    expect(page.document).toContain('<a href="linked">');
  });

  it("escapes names", async () => {
    const { options } = makeOptions();
    const page = await renderListing(fromArray([file("<b>&.txt", 1, MODIFIED)]), options);

    expect(renderedNames(page.document)).toEqual(["&lt;b&gt;&amp;.txt"]);
    expect(page.document).toContain('<a href="%3Cb%3E%26.txt">');
  });

  it("skips entries with unreadable metadata and keeps going", async () => {
    const { options, sink } = makeOptions();
    const page = await renderListing(
      fromArray([file("no-size", undefined, MODIFIED), file("no-date", 3), file("ok.txt", 3, MODIFIED)]),
      options,
    );

    expect(renderedNames(page.document)).toEqual(["ok.txt"]);
    expect(page.totalEntriesSeen).toBe(3);
    expect(page.renderedCount).toBe(1);
    expect(sink.error).toHaveBeenCalledTimes(2);
    expect(sink.error.mock.calls[0]?.[0]).toBe("Failed to read entry metadata");
    expect(sink.error.mock.calls[0]?.[1]).toBe("repo/no-size");
  });

  it("counts skipped entries without rendering them", async () => {
    const { options } = makeOptions({ skipCount: 2 });
    const page = await renderListing(fromArray([dir("a"), dir("b"), dir("c"), dir("d")]), options);

    expect(renderedNames(page.document)).toEqual(["c", "d"]);
    expect(page.totalEntriesSeen).toBe(4);
  });

  describe("truncation", () => {
    const names = ["d0", "d1", "d2", "d3", "d4", "d5", "d6", "d7", "d8", "d9"];

    async function rowSize() {
      const { options } = makeOptions();
      const empty = await renderListing(fromArray([]), options);
      const one = await renderListing(fromArray([dir("dx")]), options);
      return Buffer.byteLength(one.document) - Buffer.byteLength(empty.document);
    }

    it("stops at the entry that crosses the cap and links to the next one", async () => {
      const size = await rowSize();
      const { options } = makeOptions({ maxBytes: size * 2 });
      const pulled: string[] = [];
      async function* tracked() {
        for (const name of names) {
          pulled.push(name);
          yield dir(name);
        }
      }

      const page = await renderListing(tracked(), options);

      expect(renderedNames(page.document)).toEqual(["d0", "d1", "d2"]);
      expect(page.truncated).toBe(true);
      expect(page.totalEntriesSeen).toBe(3);
      expect(page.document).toContain('<a href="?entry=4">Next Page</a>');
      expect(pulled).toEqual(["d0", "d1", "d2"]);
    });

    it("links past the skipped entries on later pages", async () => {
      const size = await rowSize();
      const { options } = makeOptions({ maxBytes: size * 2, skipCount: 3 });

      const page = await renderListing(fromArray(names.map(dir)), options);

      expect(renderedNames(page.document)).toEqual(["d3", "d4", "d5"]);
      expect(page.document).toContain('<a href="?entry=7">Next Page</a>');
    });

    it("does not truncate when the rows fit", async () => {
      const size = await rowSize();
      const { options } = makeOptions({ maxBytes: size * 10 });

      const page = await renderListing(fromArray(names.map(dir)), options);

      expect(page.truncated).toBe(false);
      expect(page.renderedCount).toBe(10);
      expect(page.document).not.toContain("Listing truncated");
    });
  });
});

describe("directoryHref", () => {
  it("turns a directory key into an absolute path", () => {
    expect(directoryHref("a/b")).toBe("/a/b/");
    expect(directoryHref("pub/el 8")).toBe("/pub/el%208/");
    expect(directoryHref("")).toBe("/");
  });
});

describe("buildCrumbs", () => {
  it("links every ancestor and leaves the current directory plain", () => {
    expect(buildCrumbs("pub/el 8")).toEqual([
      { title: "/", href: "/" },
      { title: "pub", href: "/pub/" },
      { title: "el 8", href: null },
    ]);
  });

  it("shows only the root for the bucket root", () => {
    expect(buildCrumbs("")).toEqual([{ title: "/", href: null }]);
  });
});
