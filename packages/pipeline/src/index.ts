export { createScriptStep, renderBuildStep, DEFAULT_SCRIPT_TITLE, type BuildStep, type ScriptStepInput } from "./script-step";
export {
  branchArches,
  execCommand,
  isolateElVersionInBranch,
  isolateElVersionInRelease,
  isolateMajorMinorInGroup,
  loadGroupConfig,
  loadReleasesConfig,
  type CommandRunner,
  type GroupConfig,
} from "./release";
