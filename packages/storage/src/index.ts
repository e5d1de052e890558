export { createListPage, createS3Client, getClient } from "./client";
export { basename, entryFromCommonPrefix, entryFromObject, type Entry } from "./entry";
export { listDirectory, normalizeListPrefix, type ListDirectoryOptions, type ListPage } from "./list";
export { StoreEnumerationError } from "./errors";
