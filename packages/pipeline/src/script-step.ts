export const DEFAULT_SCRIPT_TITLE = "EXECUTE A SCRIPT ON THE REMOTE HOST";

const SSH_TARGET = "ssh -F ./.config/origin-ci-tool/inventory/.ssh_config openshiftdevel";

export type ScriptStepInput = {
  repository?: string | null;
  script: string;
  title?: string | null;
};

export type BuildStep = {
  title: string;
  command: string;
};

/**
 * Build step that runs `script` on the remote CI host as the `origin` user,
 * from the repository checkout when one is given. The script travels inside
 * an unquoted here-doc, so `$` is escaped to reach the remote shell intact.
 */
export function createScriptStep(input: ScriptStepInput): BuildStep {
  const workdir = input.repository
    ? `cd "\\\${GOPATH}/src/github.com/openshift/${input.repository}"`
    : `cd "\\\${HOME}"`;
  const command = [
    "{",
    "cat <<EOF",
    "sudo su origin",
    "set -o errexit -o nounset -o pipefail -o xtrace",
    workdir,
    input.script.replace(/\$/g, "\\$"),
    "EOF",
    `} | ${SSH_TARGET}`,
  ].join("\n");

  return { title: input.title ?? DEFAULT_SCRIPT_TITLE, command };
}

export function renderBuildStep(step: BuildStep) {
  const banner = "#".repeat(step.title.length + 4);
  return `${banner}\n# ${step.title} #\n${banner}\n${step.command}\n`;
}
