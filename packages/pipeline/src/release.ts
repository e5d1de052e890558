import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

const groupConfigSchema = z
  .object({
    arches: z.array(z.string()).optional(),
    arches_override: z.array(z.string()).nullish(),
  })
  .passthrough();

export type GroupConfig = z.infer<typeof groupConfigSchema>;

/** Runs a command and resolves with its stdout; a non-zero exit rejects with stderr in the message. */
export const execCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { maxBuffer: 64 * 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        const detail = stderr.trim() || error.message;
        reject(new Error(`${command} ${args.join(" ")} failed: ${detail}`, { cause: error }));
        return;
      }
      resolve(stdout);
    });
  });

/** `1.el8` / `3.el9_2.x` style release fields. */
export function isolateElVersionInRelease(release: string): number | null {
  const match = /^.*\.el(\d+)(?:\.+|$)/.exec(release);
  return match ? Number(match[1]) : null;
}

/** Distgit branch names such as `rhaos-4.14-rhel-9`. */
export function isolateElVersionInBranch(branchName: string): number | null {
  const match = /^.*rhel-(\d+).*$/.exec(branchName);
  return match ? Number(match[1]) : null;
}

export function isolateMajorMinorInGroup(groupName: string): [number, number] | [null, null] {
  const match = /^openshift-(\d+).(\d+)$/.exec(groupName);
  if (!match) return [null, null];
  return [Number(match[1]), Number(match[2])];
}

export async function loadGroupConfig(opts: {
  group: string;
  assembly: string;
  run?: CommandRunner;
}): Promise<GroupConfig> {
  const run = opts.run ?? execCommand;
  const stdout = await run("doozer", [
    "--group",
    opts.group,
    "--assembly",
    opts.assembly,
    "config:read-group",
    "--yaml",
  ]);
  const parsed = groupConfigSchema.safeParse(yaml.load(stdout));
  if (!parsed.success) {
    throw new Error("ocp-build-data contains invalid group config.");
  }
  return parsed.data;
}

/** `releases.yml` from a build-data checkout, or `null` when the checkout has none. */
export async function loadReleasesConfig(buildDataPath: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(join(buildDataPath, "releases.yml"), "utf8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
  const parsed = yaml.load(content);
  return isRecord(parsed) ? parsed : null;
}

/**
 * Arches built for a group. `arches_override` covers arches that are not GA
 * yet and only wins when the caller asks for GA arches.
 */
export async function branchArches(opts: {
  group: string;
  assembly: string;
  gaOnly?: boolean;
  run?: CommandRunner;
}): Promise<string[]> {
  const config = await loadGroupConfig(opts);
  const override = config.arches_override;
  if (override && override.length > 0 && opts.gaOnly) {
    return override;
  }
  if (!Array.isArray(config.arches)) {
    throw new Error(`Group config for ${opts.group} has no arches`);
  }
  return config.arches;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown) {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
