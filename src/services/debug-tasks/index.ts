/**
 * Debug task translation module.
 */

export {
  TaskTranslator,
  classifyBuildTask,
  projectName,
  TOOLCHAIN_COMMAND,
  TEST_BINARY_NAME,
  type TaskTranslatorDeps,
} from "./task-translator";
export type {
  BuildTask,
  BuildTaskIntent,
  BuildTaskIntentKind,
  DebugScenario,
  LaunchRequest,
  ScenarioOptions,
} from "./types";
