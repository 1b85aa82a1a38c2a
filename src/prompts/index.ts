export { Prompter, createTerminalPrompter } from './prompter';
export type { QuestionSource, PromptOutput } from './prompter';
export { parseRepeatAnswer, REPEAT_QUESTION } from './repeat-answer';
export type { RepeatAnswer } from './repeat-answer';
export {
  resolveInputPath,
  pathCandidates,
  splitShellWords,
  expandVariables,
  expandHome,
  isRegularFile,
} from './path-resolver';
export type { PathResolution, ResolveOptions, FileCheck } from './path-resolver';
